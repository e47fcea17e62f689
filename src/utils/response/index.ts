export * from './success';
export * from './error';
