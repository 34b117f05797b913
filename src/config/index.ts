// src/config/index.ts
export { loadConfig, getConfigPath } from './loader.js'
export { initConfig, generateConfig } from './init.js'
export * from './types.js'
