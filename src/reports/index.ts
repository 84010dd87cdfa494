export * from './materials';
export * from './pdf';
export * from './excel';
