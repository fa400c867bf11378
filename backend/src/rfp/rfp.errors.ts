import { AppError } from '../common/app.error.js';

export class IncompleteResponseError extends AppError {
  constructor(message: string) {
    super('INCOMPLETE_RESPONSE', message);
  }
}
