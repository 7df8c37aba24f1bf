/**
 * Error classes carry a stable `code` so API handlers and task loops can
 * branch on the kind of failure without matching messages.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class LotStartupError extends AppError {
  constructor(public readonly lotId: number, message: string) {
    super(`Lot ${lotId}: ${message}`, 'LOT_STARTUP_FAILED', 422);
  }
}

export class LotNotFoundError extends AppError {
  constructor(lotId: number) {
    super(`Lot ${lotId} not found`, 'NOT_FOUND', 404);
  }
}

export class StallConfigError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_STALL_CONFIG', 400);
  }
}

export class FrameSourceError extends AppError {
  constructor(message: string) {
    super(message, 'FRAME_SOURCE_ERROR', 502);
  }
}

export class DetectorError extends AppError {
  constructor(message: string) {
    super(message, 'DETECTOR_ERROR', 502);
  }
}
