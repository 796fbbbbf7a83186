export class AuthorizationError extends Error {
  readonly status = 403;
  constructor(readonly capability: string) {
    super(`Missing capability: ${capability}`);
    this.name = 'AuthorizationError';
  }
}

export class NotFoundError extends Error {
  readonly status = 404;
  constructor(what: string, id: number) {
    super(`${what} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

// Route handlers turn known helper errors into plain-text responses; anything else propagates.
export function errorResponse(e: unknown): Response {
  if (e instanceof AuthorizationError || e instanceof NotFoundError) {
    const res = new Response(e.message, { status: e.status });
    res.headers.set('Cache-Control', 'no-store, no-cache, must-revalidate, max-age=0');
    return res;
  }
  throw e;
}
