export class EngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineError";
  }
}

export class ParseError extends EngineError {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class IllegalMoveError extends EngineError {
  readonly notation: string;

  constructor(notation: string, message = `Illegal move '${notation}'.`, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IllegalMoveError";
    this.notation = notation;
  }
}

export class InvalidActionError extends EngineError {
  readonly actionIndex: number;

  constructor(actionIndex: number, legalCount: number) {
    super(`Invalid action index ${actionIndex}. Only ${legalCount} legal moves.`);
    this.name = "InvalidActionError";
    this.actionIndex = actionIndex;
  }
}

export class UnsupportedGameTypeError extends EngineError {
  readonly gameType: string;

  constructor(gameType: string) {
    super(`Unsupported game type: ${gameType}`);
    this.name = "UnsupportedGameTypeError";
    this.gameType = gameType;
  }
}

export class OracleCommunicationError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OracleCommunicationError";
  }
}

export class EnvironmentStateError extends EngineError {
  constructor(message: string) {
    super(message);
    this.name = "EnvironmentStateError";
  }
}

export class InvalidConfigError extends EngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid environment options: ${issues.join("; ")}`);
    this.name = "InvalidConfigError";
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
