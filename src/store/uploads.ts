import fs from 'node:fs/promises';
import path from 'node:path';

// Keeps letters, digits, dot, dash and underscore; everything else becomes "_".
export const safeFileName = (filename: string): string => {
  const base = path.basename(filename).replace(/[^a-zA-Z0-9._-]+/g, '_');
  return base.replace(/^\.+/, '') || 'upload.pdf';
};

export class UploadStore {
  constructor(private readonly uploadsDir: string) {}

  async save(documentId: string, filename: string, bytes: Uint8Array): Promise<string> {
    await fs.mkdir(this.uploadsDir, { recursive: true });
    const filePath = path.join(this.uploadsDir, `${documentId}_${safeFileName(filename)}`);
    await fs.writeFile(filePath, bytes);
    return filePath;
  }

  async remove(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }
}
