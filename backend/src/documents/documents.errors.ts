import { AppError } from '../common/app.error.js';

export class UnsupportedFileTypeError extends AppError {
  constructor(public readonly fileName: string) {
    super(
      'UNSUPPORTED_FILE_TYPE',
      `File type not supported for ${fileName}. Please upload a PDF, DOCX or plain text file.`,
    );
  }
}
