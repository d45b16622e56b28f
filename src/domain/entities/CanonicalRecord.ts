/**
 * Canonical Record — The Warehouse Row
 * Layer: Domain
 *
 * Two shapes for the same concept, same convention as everywhere else:
 *
 *   CanonicalRecord — camelCase, used by the normalizer and the loader.
 *   CanonicalRow    — snake_case, mirrors the warehouse columns exactly.
 *
 * Records are built once per run from the validated table and never mutated.
 * Within one batch, (countryCode, year, sexCategory) is unique and
 * lifeExpectancy is a finite number. Every record of a batch shares one
 * ingestedAt: the run's start time.
 */
import type { SexCategory } from '@shared/constants';

export type { SexCategory };

export interface CanonicalRecord {
  countryName: string;
  countryCode: string;
  year: number;
  sexCategory: SexCategory;
  lifeExpectancy: number;
  ingestedAt: Date;
}

export interface CanonicalRow {
  country_name: string;
  country_code: string;
  year: number;
  sex: SexCategory;
  life_expectancy: number;
  ingested_at: Date;
}
