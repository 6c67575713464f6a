export interface IdentityError {
  code: string;
  description: string;
}

export const DEFAULT_IDENTITY_ERROR: IdentityError = {
  code: "DefaultError",
  description: "An unknown failure has occurred.",
};

/**
 * Outcome of a store write. Engine failures are thrown, not reported here.
 */
export class IdentityResult {
  static readonly success: IdentityResult = new IdentityResult(true, []);

  readonly succeeded: boolean;
  readonly errors: readonly IdentityError[];

  private constructor(succeeded: boolean, errors: readonly IdentityError[]) {
    this.succeeded = succeeded;
    this.errors = errors;
  }

  static failed(...errors: IdentityError[]): IdentityResult {
    return new IdentityResult(false, errors.length > 0 ? errors : [DEFAULT_IDENTITY_ERROR]);
  }

  toString(): string {
    return this.succeeded ? "Succeeded" : `Failed : ${this.errors.map((e) => e.code).join(",")}`;
  }
}
