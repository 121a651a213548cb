/**
 * Errors that reach the HTTP layer carry their status code; the error
 * handler maps everything else to 500.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    readonly statusCode: number
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class ModelNotLoadedError extends HttpError {
  constructor() {
    super('No Whisper model is loaded. POST /api/whisper/load first.', 409);
    this.name = 'ModelNotLoadedError';
  }
}

export class TranscriptionBusyError extends HttpError {
  constructor(message: string = 'A transcription is already running on the loaded model') {
    super(message, 409);
    this.name = 'TranscriptionBusyError';
  }
}

export class AudioNotFoundError extends HttpError {
  constructor(audioId: string) {
    super(`Audio '${audioId}' not found or expired`, 404);
    this.name = 'AudioNotFoundError';
  }
}

export class InvalidAudioError extends HttpError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'InvalidAudioError';
  }
}
