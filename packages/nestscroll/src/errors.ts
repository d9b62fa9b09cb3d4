/**
 * Thrown when the engine is driven in a way its contracts forbid, such as
 * moving pixels outside a scrolling activity or using a nested coordinator
 * that has no outer position. Not meant to be caught at runtime.
 */
export class ScrollContractError extends Error {
  override readonly name = "ScrollContractError";
}

export function assertContract(
  condition: unknown,
  message: string,
): asserts condition {
  if (!condition) throw new ScrollContractError(message);
}
