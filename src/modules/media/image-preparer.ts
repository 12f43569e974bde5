// src/modules/media/image-preparer.ts

export const IMAGE_PREPARER = "IMAGE_PREPARER";

export interface ImagePreparer {
  prepare(bytes: Buffer): Promise<Buffer>;
}

export class PassthroughImagePreparer implements ImagePreparer {
  async prepare(bytes: Buffer): Promise<Buffer> {
    return bytes;
  }
}
