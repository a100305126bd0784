export * from './envConfig';
export * from './duration';
