export * from './password.service';
export * from './token-hash.service';
export * from './crypto.module';
