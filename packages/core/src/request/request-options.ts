/**
 * A request-scoped option handed to the transport (retry policy, redirect
 * handling, tracing, ...). Options are unique per `kind`: adding a second
 * option of the same kind replaces the first.
 */
export interface RequestOption {
  readonly kind: string;
}
