export { loadConfigFile, parseRuntimeOverrides } from './config-loader.js';
