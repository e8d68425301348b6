/**
 * Base error class for exif-carry errors
 */
export class ExifCarryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExifCarryError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when the input data is not in a shape the library accepts
 */
export class InvalidFormatError extends ExifCarryError {
  constructor(message = 'Invalid or unsupported image input') {
    super(message);
    this.name = 'InvalidFormatError';
  }
}

/**
 * Thrown when attempting to read beyond buffer bounds
 */
export class BufferOverflowError extends ExifCarryError {
  public readonly requested: number;
  public readonly available: number;

  constructor(requested: number, available: number) {
    super(`Buffer overflow: requested ${requested} bytes but only ${available} available`);
    this.name = 'BufferOverflowError';
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Thrown when a file operation is given an image type it cannot splice
 */
export class UnsupportedFormatError extends ExifCarryError {
  public readonly format: string;

  constructor(format: string) {
    super(`Unsupported format: ${format}`);
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

/**
 * Thrown by strict file operations when the source carries no Exif segment
 */
export class MissingExifError extends ExifCarryError {
  public readonly path: string;

  constructor(path: string) {
    super(`No Exif segment found in ${path}`);
    this.name = 'MissingExifError';
    this.path = path;
  }
}
