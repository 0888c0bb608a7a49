export { env, parseEnv, type AppEnv } from './env.js';
