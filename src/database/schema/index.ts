export * from './users';
export * from './reset-tokens';
export * from './relations';
