export * from './geo';
export * from './coin';
export * from './tier';
export * from './proximity';
