/**
 * Database models index - exports all model types and interfaces
 */

export * from './User';
export * from './Channel';
export * from './ScheduledPost';
