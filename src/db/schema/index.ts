export * from './appSettings';
export * from './mediaProgress';
