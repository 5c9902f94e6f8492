export * from './error-codes';
export * from './tollgate-error';
export * from './errors-factory';
export * from './tollgate-error.filter';
