import { BadRequestException } from '@nestjs/common';
import { createCardUploadOptions } from './card-upload.options';

describe('createCardUploadOptions', () => {
  const options = createCardUploadOptions({
    allowedMimeTypes: ['image/jpeg', 'application/pdf'],
    maxFileSizeMb: 2,
  });

  const upload = (mimetype: string) => ({
    fieldname: 'file',
    originalname: 'card',
    encoding: '7bit',
    mimetype,
    size: 10,
    destination: '',
    filename: '',
    path: '',
    buffer: Buffer.from('card'),
  });

  const filter = (mimetype: string) => {
    const callback = jest.fn();
    if (!options.fileFilter) {
      throw new Error('fileFilter missing');
    }
    options.fileFilter({}, upload(mimetype), callback);
    return callback;
  };

  it('should limit uploads to one file of the configured size', () => {
    expect(options.limits).toEqual({ fileSize: 2 * 1024 * 1024, files: 1 });
  });

  it('should accept an allowed MIME type', () => {
    expect(filter('application/pdf')).toHaveBeenCalledWith(null, true);
  });

  it('should reject other MIME types', () => {
    const callback = filter('image/heic');

    expect(callback).toHaveBeenCalledWith(expect.any(BadRequestException), false);
    expect(callback.mock.calls[0][0].message).toBe(
      'Invalid file type. Allowed types: image/jpeg, application/pdf',
    );
  });
});
