/** Raised before any round runs when the block, key or round count cannot be used. */
export class InvalidParametersError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidParametersError";
  }
}
