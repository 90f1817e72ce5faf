/**
 * DAO (Data Access Object) exports
 */

export * from './ChannelDAO';
export * from './ScheduleDAO';
export * from './UserDAO';
