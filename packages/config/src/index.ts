export { envSchema, parseEnv } from "./env.js";
export { MODEL_DIMENSIONS, DEFAULT_DIMENSIONS, resolveDimensions } from "./model-dimensions.js";
