export class AppError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;
  
    constructor(message: string, statusCode = 500, isOperational = true) {
      super(message);
      this.name = new.target.name;
      this.statusCode = statusCode;
      this.isOperational = isOperational;
      Error.captureStackTrace(this, this.constructor);
    }
  }
  
  export class NotFoundError extends AppError {
    constructor(message = 'Resource not found') {
      super(message, 404);
    }
  }
  
  export class ValidationError extends AppError {
    public readonly details: unknown;

    constructor(message = 'Invalid data', details: unknown = null) {
      super(message, 400);
      this.details = details;
    }
  }

  // A required argument was missing or unusable (e.g. no store given to a store-scoped query)
  export class InvalidArgumentError extends AppError {
    constructor(message = 'Invalid argument') {
      super(message, 400);
    }
  }

  // Programming / configuration defect: a variant lacks a capability it must provide
  export class NotImplementedError extends AppError {
    constructor(message = 'Not implemented') {
      super(message, 500, false);
    }
  }
