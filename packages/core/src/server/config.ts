import { Config, Option } from "effect"
import type { ParamPrecedence } from "../params"

/**
 * Which source wins, per HTTP method, when body and query string both carry a field
 */
export interface PrecedenceConfig {
  readonly get: ParamPrecedence
  readonly post: ParamPrecedence
}

/**
 * Configuration for the GraphQL HTTP router
 */
export interface HttpQueryConfig {
  /** Path for GraphQL endpoint (default: "/graphql") */
  readonly path: string
  /** Accept JSON array bodies as batches (default: false) */
  readonly batch: boolean
  /** Indent response JSON (default: false) */
  readonly pretty: boolean
  readonly precedence: PrecedenceConfig
  /** Batch operations executed at once (default: 1) */
  readonly concurrency: number | "unbounded"
}

/**
 * Default configuration values
 */
export const defaultConfig: HttpQueryConfig = {
  path: "/graphql",
  batch: false,
  pretty: false,
  precedence: { get: "query-first", post: "body-first" },
  concurrency: 1,
}

/**
 * User-provided config, where every field is optional
 */
export interface HttpQueryConfigInput {
  readonly path?: string
  readonly batch?: boolean
  readonly pretty?: boolean
  readonly precedence?: Partial<PrecedenceConfig>
  readonly concurrency?: number | "unbounded"
}

export const normalizeConfig = (input: HttpQueryConfigInput = {}): HttpQueryConfig => ({
  path: input.path ?? defaultConfig.path,
  batch: input.batch ?? defaultConfig.batch,
  pretty: input.pretty ?? defaultConfig.pretty,
  precedence: {
    get: input.precedence?.get ?? defaultConfig.precedence.get,
    post: input.precedence?.post ?? defaultConfig.precedence.post,
  },
  concurrency: input.concurrency ?? defaultConfig.concurrency,
})

const precedenceConfig = (name: string, fallback: ParamPrecedence) =>
  Config.literal("body-first", "query-first")(name).pipe(Config.withDefault(fallback))

/**
 * Effect Config for loading the router configuration from environment variables.
 *
 * Environment variables:
 * - GRAPHQL_PATH: Path for GraphQL endpoint (default: "/graphql")
 * - GRAPHQL_BATCH_ENABLED: Accept batched requests (default: false)
 * - GRAPHQL_PRETTY: Indent response JSON (default: false)
 * - GRAPHQL_GET_PRECEDENCE: "query-first" or "body-first" for GET (default: "query-first")
 * - GRAPHQL_POST_PRECEDENCE: "query-first" or "body-first" for POST (default: "body-first")
 * - GRAPHQL_BATCH_CONCURRENCY: Batch operations executed at once (default: 1, unbounded when 0)
 */
export const HttpQueryConfigFromEnv: Config.Config<HttpQueryConfig> = Config.all({
  path: Config.string("GRAPHQL_PATH").pipe(Config.withDefault("/graphql")),
  batch: Config.boolean("GRAPHQL_BATCH_ENABLED").pipe(Config.withDefault(false)),
  pretty: Config.boolean("GRAPHQL_PRETTY").pipe(Config.withDefault(false)),
  getPrecedence: precedenceConfig("GRAPHQL_GET_PRECEDENCE", "query-first"),
  postPrecedence: precedenceConfig("GRAPHQL_POST_PRECEDENCE", "body-first"),
  concurrency: Config.integer("GRAPHQL_BATCH_CONCURRENCY").pipe(Config.option),
}).pipe(
  Config.map(({ path, batch, pretty, getPrecedence, postPrecedence, concurrency }) => ({
    path,
    batch,
    pretty,
    precedence: { get: getPrecedence, post: postPrecedence },
    concurrency: Option.match(concurrency, {
      onNone: () => defaultConfig.concurrency,
      onSome: (n): number | "unbounded" => (n <= 0 ? "unbounded" : n),
    }),
  }))
)
