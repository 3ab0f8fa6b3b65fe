export * from './api/auth';
export * from './api/notification';
export * from './api/social';
export * from './events';
