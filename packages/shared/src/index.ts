export const name = '@dirdigest/shared';

export * from './errors';
export * from './logger';
export * from './config/schema';
export * from './types/digest';
export * from './fs/io';
