/** The corners handed to a canvas frame coincide, so no direction can be derived. */
export class DegenerateGeometryError extends Error {
  override readonly name = 'DegenerateGeometryError';

  constructor(message: string) {
    super(message);
  }
}

export class SingularTransformError extends Error {
  override readonly name = 'SingularTransformError';

  constructor(readonly determinant: number) {
    super(`Matrix is not invertible (determinant ${determinant}).`);
  }
}
