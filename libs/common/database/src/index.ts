export * from './with-transaction';
export * from './database.service';
export * from './database.module';
