export * from './contact.js';
export * from './phone.js';
