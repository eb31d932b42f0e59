export { ScalewayClient } from './client.js';
export type { ScalewayClientOptions } from './client.js';
export type { ScalewayApplication, ScalewayPolicy, ScalewayApiKey } from './types.js';
