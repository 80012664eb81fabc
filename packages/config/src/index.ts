export { envSchema, parseEnv, parseStoreUrl } from "./env.js";
