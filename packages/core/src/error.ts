import { Data, Equal, Equivalence, Hash, Record as Rec } from "effect"

const headersEquivalence = Rec.getEquivalence(Equivalence.string)

const sameHeaders = (
  self: Readonly<Record<string, string>> | undefined,
  that: Readonly<Record<string, string>> | undefined
): boolean =>
  self === undefined || that === undefined ? self === that : headersEquivalence(self, that)

/**
 * A protocol-level failure. Raised before any operation of the request runs
 * and aborts the whole request, batch included.
 *
 * The HTTP layer turns it into a response with `statusCode` and `headers`.
 */
export class HttpQueryError
  extends Data.TaggedError("HttpQueryError")<{
    readonly statusCode: number
    readonly message: string
    readonly headers?: Readonly<Record<string, string>>
  }>
  implements Equal.Equal
{
  [Equal.symbol](that: Equal.Equal): boolean {
    return (
      that instanceof HttpQueryError &&
      this.statusCode === that.statusCode &&
      this.message === that.message &&
      sameHeaders(this.headers, that.headers)
    )
  }

  [Hash.symbol](): number {
    return Hash.cached(
      this,
      Hash.combine(Hash.hash(this.statusCode))(Hash.string(this.message))
    )
  }
}

/**
 * Shorthand for the 400 variant, which never carries headers.
 */
export const badRequest = (message: string): HttpQueryError =>
  new HttpQueryError({ statusCode: 400, message })
