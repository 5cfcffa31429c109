export * from './donor-registration/index.js';
