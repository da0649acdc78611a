/**
 * Handler composition for the API endpoints.
 * Endpoints are built as `pipeline(logging, errorHandler, validateBody(schema))(handler)`:
 * the first middleware is the outermost layer, so request logging sees the
 * response the error handler produced.
 */

export interface HandlerContext {
  /** Correlation id for log lines belonging to this request. */
  requestId: string;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;

export type Middleware = (next: Handler) => Handler;

export function pipeline(...middlewares: Middleware[]): (handler: Handler) => Handler {
  return (handler) => {
    let wrapped = handler;
    for (let i = middlewares.length - 1; i >= 0; i--) {
      const middleware = middlewares[i];
      if (middleware) wrapped = middleware(wrapped);
    }
    return wrapped;
  };
}
