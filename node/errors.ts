export class ConfigError extends Error {
  name = "ConfigError";
}

export class EmptySelectionError extends Error {
  name = "EmptySelectionError";

  constructor() {
    super("the list is empty");
  }
}

export class OutsideImageRootError extends Error {
  name = "OutsideImageRootError";

  constructor(readonly imageRoot: string, readonly selection: string) {
    super(`${selection} is not under ${imageRoot}`);
  }
}

export class TemplateError extends Error {
  name = "TemplateError";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
