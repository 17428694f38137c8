import { describe, it, expect } from "vitest"
import { ConfigProvider, Effect } from "effect"
import {
  defaultConfig,
  HttpQueryConfigFromEnv,
  normalizeConfig,
} from "../../../src/server/config"

const loadFromEnv = (env: Record<string, string>) =>
  Effect.runSync(
    HttpQueryConfigFromEnv.pipe(
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env))))
    )
  )

describe("config.ts", () => {
  describe("normalizeConfig", () => {
    it("should fill in defaults", () => {
      expect(normalizeConfig()).toEqual(defaultConfig)
      expect(defaultConfig).toEqual({
        path: "/graphql",
        batch: false,
        pretty: false,
        precedence: { get: "query-first", post: "body-first" },
        concurrency: 1,
      })
    })

    it("should keep provided values", () => {
      const config = normalizeConfig({
        path: "/api",
        batch: true,
        precedence: { get: "body-first" },
        concurrency: "unbounded",
      })

      expect(config).toEqual({
        path: "/api",
        batch: true,
        pretty: false,
        precedence: { get: "body-first", post: "body-first" },
        concurrency: "unbounded",
      })
    })
  })

  describe("HttpQueryConfigFromEnv", () => {
    it("should use defaults when nothing is set", () => {
      expect(loadFromEnv({})).toEqual(defaultConfig)
    })

    it("should read every variable", () => {
      const config = loadFromEnv({
        GRAPHQL_PATH: "/gql",
        GRAPHQL_BATCH_ENABLED: "true",
        GRAPHQL_PRETTY: "true",
        GRAPHQL_GET_PRECEDENCE: "body-first",
        GRAPHQL_POST_PRECEDENCE: "query-first",
        GRAPHQL_BATCH_CONCURRENCY: "4",
      })

      expect(config).toEqual({
        path: "/gql",
        batch: true,
        pretty: true,
        precedence: { get: "body-first", post: "query-first" },
        concurrency: 4,
      })
    })

    it("should treat a concurrency of 0 as unbounded", () => {
      expect(loadFromEnv({ GRAPHQL_BATCH_CONCURRENCY: "0" }).concurrency).toBe("unbounded")
    })

    it("should reject an unknown precedence", () => {
      const exit = Effect.runSyncExit(
        HttpQueryConfigFromEnv.pipe(
          Effect.withConfigProvider(
            ConfigProvider.fromMap(new Map([["GRAPHQL_GET_PRECEDENCE", "sideways"]]))
          )
        )
      )

      expect(exit._tag).toBe("Failure")
    })
  })
})
