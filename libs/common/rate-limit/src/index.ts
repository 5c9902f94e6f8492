export * from './rate-limit.types';
export * from './token-bucket';
export * from './bucket-store';
export * from './in-memory-bucket-store';
export * from './rate-limit.options';
export * from './admission-controller.service';
export * from './rate-limit.module';
