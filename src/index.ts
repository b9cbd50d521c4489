export { kvSecretsPlugin as default } from './plugin';
export { kvSecretsPlugin } from './plugin';
export { createRouter } from './router';
export type { RouterOptions } from './router';
export { VaultService } from './vault';
export type { VaultServiceOptions } from './vault';
export { readVaultConfig } from './config';
export * from './errors';
export * from './types';
