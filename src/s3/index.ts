export { createAnonymousS3Client } from './client.js';
