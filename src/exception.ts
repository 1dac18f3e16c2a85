export class GestureException extends Error {
  constructor(message: string, stack?: string | undefined) {
    super(message);
    this.name = "GestureError";
    if (stack !== undefined) {
      this.stack = stack;
    }
  }
}
