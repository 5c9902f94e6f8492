export * from './auth.types';
export * from './clock';
