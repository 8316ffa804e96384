export * from './paths';
export * from './metadata';
export * from './lock';
export * from './mirror';
