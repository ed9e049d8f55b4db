/**
 * Schema exports for Drizzle ORM.
 */

export * from './chunks';
