/** Invalid options. Raised before any document is read or link checked. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly option?: string
  ) {
    super(option ? `${option}: ${message}` : message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
