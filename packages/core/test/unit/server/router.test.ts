import { describe, it, expect } from "vitest"
import { Cause, Effect, Layer } from "effect"
import { HttpApp, HttpServerResponse } from "@effect/platform"
import { makeHttpQueryRouter, type ErrorHandler } from "../../../src/server/router"
import { graphqlJsExecutor } from "../../../src/executor"
import { testSchema } from "../../helpers/schema-fixtures"

// Helper to convert router to a web handler and send a request
const send = async (
  config: Parameters<typeof makeHttpQueryRouter>[1],
  request: Request
) => {
  const router = makeHttpQueryRouter(testSchema, config)
  const { handler, dispose } = HttpApp.toWebHandlerLayer(router, Layer.empty)

  try {
    const response = await handler(request)
    return {
      status: response.status,
      headers: response.headers,
      body: await response.text(),
    }
  } finally {
    await dispose()
  }
}

const get = (params: Record<string, string>, path = "/graphql") =>
  new Request(`http://localhost${path}?${new URLSearchParams(params)}`, { method: "GET" })

const post = (body: string, contentType = "application/json", search = "") =>
  new Request(`http://localhost/graphql${search}`, {
    method: "POST",
    headers: { "content-type": contentType },
    body,
  })

describe("router.ts", () => {
  // ==========================================================================
  // makeHttpQueryRouter - GET
  // ==========================================================================
  describe("makeHttpQueryRouter - GET", () => {
    it("should execute a query from the query string", async () => {
      const response = await send({}, get({ query: "{test}" }))

      expect(response.status).toBe(200)
      expect(response.body).toBe('{"data":{"test":"Hello World"}}')
    })

    it("should reject a mutation with 405 and Allow: POST", async () => {
      const response = await send({}, get({ query: "mutation { writeTest { test } }" }))

      expect(response.status).toBe(405)
      expect(response.headers.get("allow")).toBe("POST")
      expect(response.body).toBe(
        '{"errors":[{"message":"Can only perform a mutation operation from a POST request."}]}'
      )
    })

    it("should answer 400 when no query is given", async () => {
      const response = await send({}, get({}))

      expect(response.status).toBe(400)
      expect(response.body).toBe('{"errors":[{"message":"Must provide query string."}]}')
    })

    it("should pretty print when the pretty parameter is present", async () => {
      const response = await send({}, get({ query: "{test}", pretty: "1" }))

      expect(response.body).toBe('{\n  "data": {\n    "test": "Hello World"\n  }\n}')
    })

    it("should pretty print a rejection when the pretty parameter is present", async () => {
      const response = await send({}, get({ pretty: "1" }))

      expect(response.status).toBe(400)
      expect(response.body).toBe(
        '{\n  "errors": [\n    {\n      "message": "Must provide query string."\n    }\n  ]\n}'
      )
    })

    it("should serve a custom path", async () => {
      const response = await send({ path: "/api" }, get({ query: "{test}" }, "/api"))

      expect(response.status).toBe(200)
    })
  })

  // ==========================================================================
  // makeHttpQueryRouter - POST
  // ==========================================================================
  describe("makeHttpQueryRouter - POST", () => {
    it("should execute a JSON body", async () => {
      const response = await send(
        {},
        post(JSON.stringify({ query: "mutation { writeTest { test } }" }))
      )

      expect(response.status).toBe(200)
      expect(response.body).toBe('{"data":{"writeTest":{"test":"Hello World"}}}')
    })

    it("should execute a url-encoded body", async () => {
      const response = await send(
        {},
        post(
          new URLSearchParams({
            query: "query helloWho($who: String){ test(who: $who) }",
            variables: '{"who": "Dolly"}',
          }).toString(),
          "application/x-www-form-urlencoded"
        )
      )

      expect(response.body).toBe('{"data":{"test":"Hello Dolly"}}')
    })

    it("should execute a multipart form body", async () => {
      const form = new FormData()
      form.append("query", "mutation TestMutation { writeTest { test } }")

      const response = await send(
        {},
        new Request("http://localhost/graphql", { method: "POST", body: form })
      )

      expect(response.status).toBe(200)
      expect(response.body).toBe('{"data":{"writeTest":{"test":"Hello World"}}}')
    })

    it("should execute a raw GraphQL body with query-string variables", async () => {
      const response = await send(
        {},
        post(
          "query helloWho($who: String){ test(who: $who) }",
          "application/graphql",
          `?${new URLSearchParams({ variables: '{"who": "Dolly"}' })}`
        )
      )

      expect(response.body).toBe('{"data":{"test":"Hello Dolly"}}')
    })

    it("should answer 400 on invalid JSON", async () => {
      const response = await send({}, post('{"query":'))

      expect(response.status).toBe(400)
      expect(response.body).toBe('{"errors":[{"message":"POST body sent invalid JSON."}]}')
    })

    it("should answer 400 with the errors of a failed operation", async () => {
      const response = await send({}, post(JSON.stringify({ query: "{thrower}" })))

      expect(response.status).toBe(400)
      expect(response.body).toBe(
        '{"data":null,"errors":[{"message":"Throws!","locations":[{"line":1,"column":2}],"path":["thrower"]}]}'
      )
    })

    it("should pass the request context to resolvers", async () => {
      const response = await send(
        { context: (request) => ({ q: request.headers["x-q"] }) },
        new Request("http://localhost/graphql", {
          method: "POST",
          headers: { "content-type": "application/json", "x-q": "testing" },
          body: JSON.stringify({ query: "{request}" }),
        })
      )

      expect(response.body).toBe('{"data":{"request":"testing"}}')
    })
  })

  // ==========================================================================
  // makeHttpQueryRouter - Batches
  // ==========================================================================
  describe("makeHttpQueryRouter - Batches", () => {
    const batch = JSON.stringify([
      { query: "{test}" },
      { query: "query helloWho($who: String){ test(who: $who) }", variables: { who: "Dolly" } },
    ])

    it("should reject batches unless enabled", async () => {
      const response = await send({}, post(batch))

      expect(response.status).toBe(400)
      expect(response.body).toBe(
        '{"errors":[{"message":"Batch GraphQL requests are not enabled."}]}'
      )
    })

    it("should answer a batch with an array in request order", async () => {
      const response = await send({ batch: true }, post(batch))

      expect(response.status).toBe(200)
      expect(response.body).toBe('[{"data":{"test":"Hello World"}},{"data":{"test":"Hello Dolly"}}]')
    })
  })

  // ==========================================================================
  // makeHttpQueryRouter - Methods and errors
  // ==========================================================================
  describe("makeHttpQueryRouter - Methods and errors", () => {
    it("should answer 405 with Allow: GET, POST for other methods", async () => {
      const response = await send(
        {},
        new Request("http://localhost/graphql", { method: "PUT", body: "{}" })
      )

      expect(response.status).toBe(405)
      expect(response.headers.get("allow")).toBe("GET, POST")
      expect(response.body).toBe(
        '{"errors":[{"message":"GraphQL only supports GET and POST requests."}]}'
      )
    })

    it("should use a custom error handler for defects", async () => {
      const errorHandler: ErrorHandler = (cause) =>
        HttpServerResponse.json(
          { errors: [{ message: Cause.pretty(cause).includes("boom") ? "handled" : "other" }] },
          { status: 503 }
        ).pipe(Effect.orDie)

      const response = await send(
        {
          errorHandler,
          context: () => {
            throw new Error("boom")
          },
        },
        get({ query: "{test}" })
      )

      expect(response.status).toBe(503)
      expect(response.body).toBe('{"errors":[{"message":"handled"}]}')
    })

    it("should run operations with a custom executor", async () => {
      let executed = 0
      const response = await send(
        {
          executor: {
            ...graphqlJsExecutor,
            execute: (args) => {
              executed += 1
              return graphqlJsExecutor.execute(args)
            },
          },
        },
        get({ query: "{test}" })
      )

      expect(response.status).toBe(200)
      expect(executed).toBe(1)
    })
  })
})
