export class DictionaryError extends Error {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(`Dictionary ${filePath}: ${reason}`);
    this.name = "DictionaryError";
    this.filePath = filePath;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
