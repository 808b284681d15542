export type RelayStage =
  | "config"
  | "window"
  | "region"
  | "capture"
  | "recognition"
  | "dispatch"
  | "control";

export class RelayError extends Error {
  public readonly stage: RelayStage;
  public readonly recoverable: boolean;

  constructor(message: string, stage: RelayStage, recoverable: boolean) {
    super(message);
    this.name = "RelayError";
    this.stage = stage;
    this.recoverable = recoverable;
  }
}

export class ConfigError extends RelayError {
  constructor(message: string) {
    super(message, "config", false);
    this.name = "ConfigError";
  }
}

export class MissingEndpointError extends ConfigError {
  constructor() {
    super("WEBHOOK_URL is required.");
    this.name = "MissingEndpointError";
  }
}

export class WindowNotFoundError extends RelayError {
  constructor(title: string) {
    super(`Window not found: ${title}`, "window", true);
    this.name = "WindowNotFoundError";
  }
}

export class InvalidRegionError extends RelayError {
  constructor(message: string) {
    super(message, "region", true);
    this.name = "InvalidRegionError";
  }
}

export class EmptyRegionError extends RelayError {
  constructor(message: string) {
    super(message, "capture", true);
    this.name = "EmptyRegionError";
  }
}

export class CaptureFailedError extends RelayError {
  constructor(message: string) {
    super(message, "capture", true);
    this.name = "CaptureFailedError";
  }
}

export class RecognitionError extends RelayError {
  constructor(message: string) {
    super(message, "recognition", true);
    this.name = "RecognitionError";
  }
}

export class DeliveryFailedError extends RelayError {
  public readonly status: number | null;

  constructor(message: string, status: number | null) {
    super(message, "dispatch", false);
    this.name = "DeliveryFailedError";
    this.status = status;
  }
}

export class ControlFileError extends RelayError {
  constructor(message: string) {
    super(message, "control", false);
    this.name = "ControlFileError";
  }
}

export const formatError = (error: unknown) => {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`.trim();
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
};
