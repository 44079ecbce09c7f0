export * from './error';
export * from './medicine';
