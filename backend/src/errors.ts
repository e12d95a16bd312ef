/**
 * Application errors carry two messages: `message` for logs, `userMessage`
 * for the response body. `status` is the HTTP status the API answers with.
 */
export class AppError extends Error {
  readonly userMessage: string;
  readonly status: number;

  constructor(message: string, options: { userMessage?: string; status?: number } = {}) {
    super(message);
    this.name = new.target.name;
    this.userMessage = options.userMessage || "An error occurred. Please try again.";
    this.status = options.status ?? 500;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, { userMessage: "Service configuration error. Please contact the administrator." });
  }
}

export class DocumentError extends AppError {
  constructor(message: string, userMessage?: string) {
    super(message, {
      userMessage: userMessage || "Could not process the document. Please check the file and try again.",
      status: 422
    });
  }
}

export class DocumentValidationError extends DocumentError {
  constructor(reason: string) {
    super(`Document validation failed: ${reason}`, `Invalid document: ${reason}`);
  }
}

export class SessionError extends AppError {
  constructor(message: string, userMessage?: string, status = 409) {
    super(message, {
      userMessage: userMessage || "Session error. Please start over.",
      status
    });
  }
}

export class SessionNotFoundError extends SessionError {
  constructor(userId: string) {
    super(`Session not found for user ${userId}`, "Your session has expired. Please start over.", 404);
  }
}

export class NoDocumentError extends SessionError {
  constructor(userId: string) {
    super(`No document attached for user ${userId}`, "Please send a document file first.");
  }
}

export class UsageLimitError extends AppError {
  readonly nextExpiry: number | null;

  constructor(userId: string, nextExpiry: number | null) {
    super(`Usage limit reached for user ${userId}`, {
      userMessage: "Analysis limit reached. Please try again later.",
      status: 429
    });
    this.nextExpiry = nextExpiry;
  }
}

export class FixGenerationError extends AppError {
  constructor(message: string, userMessage?: string) {
    super(message, {
      userMessage: userMessage || "Fix generation is temporarily unavailable. Please try again.",
      status: 502
    });
  }
}
