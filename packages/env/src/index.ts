export { getDatabasePath, getNodeEnv, parseEnv, resetEnvCache } from './config.js';
