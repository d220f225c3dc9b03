/**
 * @module util
 *
 * Environment, logging, errors and the outbound HTTP client shared by the app.
 */

export * from './at-exit';
export * from './env';
export * from './error';
export * from './logger';
export * from './resilient-client';
export * from './sleep';
export * from './text';
