import { hasMessage } from "./guards";

/** A required setting is missing or invalid. Reported without a stack trace. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class WebhookParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WebhookParseError";
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (hasMessage(error)) return error.message;
  return "An unknown error occurred";
}

function formatLine(symbol: string, component: string, title: string, message?: string): string {
  const line = `${symbol} [${component}] ${title}`;
  return message ? `${line} – ${message}` : line;
}

export function showWarning(component: string, title: string, message?: string): void {
  console.warn(formatLine("⚠", component, title, message));
}

export function showSuccess(component: string, title: string, message?: string): void {
  console.log(formatLine("✔", component, title, message));
}

export function showProgress(component: string, title: string, message?: string): void {
  console.log(formatLine("…", component, title, message));
}
