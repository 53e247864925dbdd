// backend/services/shared/src/respond/invalidAction.ts
import { handlerMethodName, type ActionName } from "./actionResolver";

export type UnsupportedActionBody = {
  error: "Action not supported";
  message: string;
  details: {
    action: ActionName;
    controller: string;
    required_method: string;
  };
  suggestions: [string, string];
};

/** Body rendered (400) when no handler resolves for an action. */
export function unsupportedActionBody(
  action: ActionName,
  controller: string
): UnsupportedActionBody {
  const requiredMethod = handlerMethodName(action);
  return {
    error: "Action not supported",
    message: `The action '${action}' is not supported by this controller`,
    details: {
      action,
      controller,
      required_method: requiredMethod,
    },
    suggestions: [
      `Define a '${requiredMethod}' handler with defineHandler('${action}', ...) in your controller`,
      `Use mapAction('${action}', { to: 'existing_action' }) to map it to an existing response handler`,
    ],
  };
}
