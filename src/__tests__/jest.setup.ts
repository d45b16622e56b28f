/**
 * Jest Global Setup
 *
 * Runs before every test file. tsyringe's decorators (@injectable, @inject)
 * need the Reflect metadata API at class-definition time; in production
 * container.ts imports it first, here this file does.
 */
import 'reflect-metadata';
