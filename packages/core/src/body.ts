import { Multipart } from "@effect/platform"
import { Effect, Either, Stream } from "effect"
import * as S from "effect/Schema"
import { badRequest, type HttpQueryError } from "./error"
import type { RequestData } from "./params"

/**
 * What a request body decodes to: one params object, or an array of them
 * for a batch. Anything else JSON can hold is rejected later by the dispatcher.
 */
export type BatchEnvelope = RequestData | ReadonlyArray<unknown>

export const isBatchEnvelope = (data: unknown): data is ReadonlyArray<unknown> =>
  Array.isArray(data)

/**
 * Body encodings the decoder understands.
 */
export type BodyKind = "json" | "form" | "multipart" | "graphql" | "unknown"

const decodeJson = S.decodeUnknownEither(S.parseJson())

/**
 * Classify a `Content-Type` header value, ignoring parameters and case.
 */
export const bodyKind = (contentType: string | undefined): BodyKind => {
  const mediaType = (contentType ?? "").split(";")[0].trim().toLowerCase()
  if (mediaType === "application/json" || mediaType.endsWith("+json")) {
    return "json"
  }
  if (mediaType === "application/x-www-form-urlencoded") {
    return "form"
  }
  if (mediaType === "multipart/form-data") {
    return "multipart"
  }
  if (mediaType === "application/graphql") {
    return "graphql"
  }
  return "unknown"
}

/**
 * Parse a JSON request body.
 */
export const loadJsonBody = (text: string): Effect.Effect<unknown, HttpQueryError> =>
  Either.match(decodeJson(text), {
    onLeft: () => Effect.fail(badRequest("POST body sent invalid JSON.")),
    onRight: Effect.succeed,
  })

/**
 * Flatten url-encoded pairs into an object. Repeated keys keep the last value.
 */
export const searchParamsToData = (params: URLSearchParams): RequestData => {
  const data: Record<string, string> = {}
  params.forEach((value, key) => {
    data[key] = value
  })
  return data
}

const noFields: Readonly<Record<string, string>> = {}

const collectField = (
  fields: Readonly<Record<string, string>>,
  part: Multipart.Part
): Effect.Effect<Readonly<Record<string, string>>, Multipart.MultipartError> =>
  Multipart.isField(part)
    ? Effect.succeed({ ...fields, [part.key]: part.value })
    : Stream.runDrain(part.content).pipe(Effect.as(fields))

/**
 * Read the text fields of a `multipart/form-data` body. File parts are
 * skipped; repeated keys keep the last value.
 */
export const loadMultipartBody = (
  body: string,
  contentType: string
): Effect.Effect<RequestData, HttpQueryError> =>
  Stream.make(new TextEncoder().encode(body)).pipe(
    Stream.pipeThroughChannel(Multipart.makeChannel({ "content-type": contentType })),
    Stream.runFoldEffect(noFields, collectField),
    Effect.mapError(() => badRequest("POST body sent invalid multipart data."))
  )

/**
 * Turn a raw request body into a batch envelope according to its content type.
 */
export const decodeBody = (
  body: string,
  contentType: string | undefined
): Effect.Effect<unknown, HttpQueryError> => {
  switch (bodyKind(contentType)) {
    case "json":
      return loadJsonBody(body)
    case "form":
      return Effect.succeed(searchParamsToData(new URLSearchParams(body)))
    case "multipart":
      return loadMultipartBody(body, contentType ?? "")
    case "graphql":
      return Effect.succeed({ query: body })
    case "unknown":
      return Effect.succeed({})
  }
}
