export { loadConfig } from './app-config.js';
export type { AppConfig, DeliveryConfig } from './app-config.js';
