/**
 * Error controlado de la librería. Se reserva para usos indebidos de un contexto;
 * los fallos del ORM se propagan sin envolver.
 */
export class ApplicationError extends Error {
  public readonly code: string;

  public readonly metadata?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      metadata?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ApplicationError';
    this.code = options.code ?? 'APPLICATION_ERROR';
    this.metadata = options.metadata;
  }
}

export const contextDisposedError = (): ApplicationError =>
  new ApplicationError('El contexto ya fue liberado y no puede reutilizarse', {
    code: 'CONTEXT_DISPOSED'
  });
