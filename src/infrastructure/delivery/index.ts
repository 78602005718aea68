export { default as deliveryPlugin } from './delivery-plugin.js';
export type { DeliveryPluginOptions, DeliveryServices } from './delivery-plugin.js';
