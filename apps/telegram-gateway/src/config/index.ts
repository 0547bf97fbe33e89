export { loadConfig, type AppConfig } from './env';
