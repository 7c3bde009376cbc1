export {
  EnvSchema,
  EMBEDDING_DIMENSIONS,
  parseEnv,
  createConfig,
  type Env,
  type AppConfig,
} from './env.js';
