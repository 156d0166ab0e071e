import { InvalidImageError } from '../helpers/errors';

/**
 * The two ways a client can hand over an image, resolved once at the
 * handler boundary.
 */
export type ImageInput =
  | { kind: 'file'; buffer: Buffer; filename: string }
  | { kind: 'base64'; data: string };

export interface UploadedImage {
  buffer: Buffer;
  originalname: string;
  size: number;
}

export interface ImageRequestParts {
  file?: UploadedImage;
  body: unknown;
  isJson: boolean;
  isMultipart: boolean;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/\-_]+={0,2}$/;

const readImageField = (body: unknown): unknown => {
  if (typeof body !== 'object' || body === null || !('image' in body)) {
    return undefined;
  }
  return body.image;
};

export function resolveImageInput({ file, body, isJson, isMultipart }: ImageRequestParts): ImageInput {
  const image = readImageField(body);

  if (file && image !== undefined) {
    throw new InvalidImageError("Provide either a 'file' upload or a base64 'image', not both");
  }

  if (file) {
    if (file.originalname === '' || file.size === 0) {
      throw new InvalidImageError('No file selected');
    }
    return { kind: 'file', buffer: file.buffer, filename: file.originalname };
  }

  if (image !== undefined) {
    if (typeof image !== 'string') {
      throw new InvalidImageError("The 'image' field must be a base64 encoded string");
    }
    return { kind: 'base64', data: image };
  }

  if (isJson) {
    throw new InvalidImageError("No 'image' field in JSON request");
  }
  if (isMultipart) {
    throw new InvalidImageError('No file uploaded');
  }
  throw new InvalidImageError(
    'Invalid request format. Use multipart/form-data or JSON with base64 image'
  );
}

/** Strips an optional data-URL prefix and decodes the remaining base64 payload. */
export function decodeBase64Image(data: string): Buffer {
  const marker = data.indexOf('base64,');
  const payload = (marker === -1 ? data : data.slice(marker + 'base64,'.length)).replace(/\s/g, '');

  if (payload.length === 0) {
    throw new InvalidImageError('Empty base64 image data');
  }
  if (!BASE64_PATTERN.test(payload)) {
    throw new InvalidImageError('Invalid base64 image data');
  }

  return Buffer.from(payload, 'base64');
}

export function toImageBuffer(input: ImageInput): Buffer {
  switch (input.kind) {
    case 'file':
      return input.buffer;
    case 'base64':
      return decodeBase64Image(input.data);
  }
}
