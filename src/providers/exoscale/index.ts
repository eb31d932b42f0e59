export { ExoscaleClient } from './client.js';
export type { ExoscaleClientOptions } from './client.js';
export type { ExoscaleOperation, ExoscaleIamRole, ExoscaleApiKey } from './types.js';
