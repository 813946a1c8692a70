/**
 * @boardscout/schemas - Zod schemas and inferred types shared by every package
 */

export * from './enums';
export * from './configuration';
export * from './job';
export * from './target';
export * from './workflow';
