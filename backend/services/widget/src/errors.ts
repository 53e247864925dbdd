// backend/services/widget/src/errors.ts
/**
 * Request-level faults. `status` is picked up by the shared problem
 * middleware; anything without one renders as 500.
 */

export class WidgetNotFoundError extends Error {
  public readonly status = 404;
  public readonly code = "WIDGET_NOT_FOUND";

  constructor(public readonly id: string) {
    super(`Widget '${id}' not found`);
    this.name = "WidgetNotFoundError";
  }
}

export class WidgetInputError extends Error {
  public readonly status = 400;
  public readonly code = "WIDGET_INPUT_INVALID";

  constructor(message: string) {
    super(message);
    this.name = "WidgetInputError";
  }
}
