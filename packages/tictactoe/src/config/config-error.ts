export class ConfigError extends Error {
  constructor(
    message: string,
    readonly setting: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
