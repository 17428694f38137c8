import type { GraphQLFormattedError } from "graphql"
import { HttpQueryResult, outcomesOf, type ExecutionOutcome } from "./dispatch"

/**
 * Externally visible shape of one outcome.
 */
export interface FormattedOutcome {
  readonly data: Readonly<Record<string, unknown>> | null
  readonly errors?: ReadonlyArray<GraphQLFormattedError>
}

export interface EncodedResponse {
  readonly body: string
  readonly statusCode: number
}

export const formatOutcome = (outcome: ExecutionOutcome): FormattedOutcome =>
  outcome.errors
    ? { data: outcome.data, errors: outcome.errors.map((error) => error.toJSON()) }
    : { data: outcome.data }

/**
 * Serialize to JSON: compact by default, 2-space indented when `pretty`.
 */
export const jsonEncode = (value: unknown, pretty = false): string =>
  pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value)

/**
 * Encode a dispatch result for the wire. A single request yields an object,
 * a batch an array. Any outcome without data makes the response a 400.
 */
export const encodeExecutionResults = (
  result: HttpQueryResult,
  options: { readonly pretty?: boolean } = {}
): EncodedResponse => {
  const statusCode = outcomesOf(result).some((outcome) => outcome.data === null) ? 400 : 200
  const payload = HttpQueryResult.$match(result, {
    Single: ({ outcome }) => formatOutcome(outcome),
    Batch: ({ outcomes }) => outcomes.map(formatOutcome),
  })
  return { body: jsonEncode(payload, options.pretty), statusCode }
}
