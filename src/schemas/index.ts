export * from './base';
export * from './entities/contact';
