export * from './contact';
export * from './user';
