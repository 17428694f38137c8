// Configuration types and utilities
export type {
  HttpQueryConfig,
  HttpQueryConfigInput,
  PrecedenceConfig,
} from "./config"

export {
  defaultConfig,
  normalizeConfig,
  HttpQueryConfigFromEnv,
} from "./config"

// Router factory
export {
  makeHttpQueryRouter,
  defaultErrorHandler,
  type MakeHttpQueryRouterOptions,
  type ErrorHandler,
} from "./router"
