import { expect } from 'chai';
import { InvalidImageError } from '../../src/helpers/errors';
import {
  decodeBase64Image,
  resolveImageInput,
  toImageBuffer,
  UploadedImage,
} from '../../src/utils/image-input';

const upload = (content: string, originalname = 'soil.png'): UploadedImage => {
  const buffer = Buffer.from(content);
  return { buffer, originalname, size: buffer.length };
};

describe('image input', () => {
  describe('resolveImageInput', () => {
    it('should resolve a multipart file upload', () => {
      const file = upload('png-bytes');

      const input = resolveImageInput({ file, body: {}, isJson: false, isMultipart: true });

      expect(input).to.deep.equal({ kind: 'file', buffer: file.buffer, filename: 'soil.png' });
    });

    it('should resolve a base64 image from a JSON body', () => {
      const input = resolveImageInput({
        body: { image: 'aGVsbG8=' },
        isJson: true,
        isMultipart: false,
      });

      expect(input).to.deep.equal({ kind: 'base64', data: 'aGVsbG8=' });
    });

    it('should reject a request carrying both a file and a base64 image', () => {
      expect(() =>
        resolveImageInput({
          file: upload('png-bytes'),
          body: { image: 'aGVsbG8=' },
          isJson: false,
          isMultipart: true,
        })
      )
        .to.throw(InvalidImageError)
        .with.property('message', "Provide either a 'file' upload or a base64 'image', not both");
    });

    it('should reject an empty file upload', () => {
      expect(() =>
        resolveImageInput({ file: upload('', 'soil.png'), body: {}, isJson: false, isMultipart: true })
      ).to.throw('No file selected');
    });

    it('should reject a JSON body without an image field', () => {
      expect(() => resolveImageInput({ body: { picture: 'x' }, isJson: true, isMultipart: false })).to.throw(
        "No 'image' field in JSON request"
      );
    });

    it('should reject a non-string image field', () => {
      expect(() => resolveImageInput({ body: { image: 42 }, isJson: true, isMultipart: false })).to.throw(
        "The 'image' field must be a base64 encoded string"
      );
    });

    it('should reject a multipart request without a file', () => {
      expect(() => resolveImageInput({ body: {}, isJson: false, isMultipart: true })).to.throw(
        'No file uploaded'
      );
    });

    it('should reject any other request format', () => {
      expect(() => resolveImageInput({ body: undefined, isJson: false, isMultipart: false })).to.throw(
        'Invalid request format. Use multipart/form-data or JSON with base64 image'
      );
    });
  });

  describe('decodeBase64Image', () => {
    it('should decode plain base64', () => {
      expect(decodeBase64Image('aGVsbG8=').toString()).to.equal('hello');
    });

    it('should strip a data URL prefix', () => {
      expect(decodeBase64Image('data:image/jpeg;base64,aGVsbG8=').toString()).to.equal('hello');
    });

    it('should ignore line breaks in the payload', () => {
      expect(decodeBase64Image('aGVs\nbG8=').toString()).to.equal('hello');
    });

    it('should reject characters outside the base64 alphabet', () => {
      expect(() => decodeBase64Image('not base64!')).to.throw(InvalidImageError, 'Invalid base64 image data');
    });

    it('should reject an empty payload', () => {
      expect(() => decodeBase64Image('data:image/png;base64,')).to.throw('Empty base64 image data');
    });
  });

  describe('toImageBuffer', () => {
    it('should return the uploaded bytes unchanged', () => {
      const buffer = Buffer.from('raw');

      expect(toImageBuffer({ kind: 'file', buffer, filename: 'soil.jpg' })).to.equal(buffer);
    });

    it('should decode a base64 input', () => {
      expect(toImageBuffer({ kind: 'base64', data: 'aGVsbG8=' }).toString()).to.equal('hello');
    });
  });
});
