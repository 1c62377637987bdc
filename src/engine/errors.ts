/** Thrown when a line or clue cannot be inferred on at all (bad lengths, bad cells). */
export class InvalidLineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidLineError";
  }
}
