/**
 * Providers module exports
 */
export { DNSProvider, type ProviderInfo } from './base/DNSProvider.js';
export { DesignateProvider, type DesignateProviderOptions } from './designate/DesignateProvider.js';
export { KeystoneAuth, type KeystoneSession } from './designate/KeystoneAuth.js';
export { createProvider, connect, type ConnectOptions, type ConnectFn } from './ProviderFactory.js';
