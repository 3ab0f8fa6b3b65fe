export * from './user';
export * from './social';
