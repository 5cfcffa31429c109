export * from './DonorRegistrationHandler.js';
