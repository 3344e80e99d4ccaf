import axios, { type AxiosInstance } from 'axios';
import { UPLOAD_BASE_URL } from '../config';
import { toApiError } from '../api/errors';

export interface FileSource {
  exists(path: string): Promise<boolean>;
  read(path: string): Promise<Uint8Array>;
}

export const fileNameFromPath = (filePath: string): string => {
  const segments = filePath.split(/[\\/]/);
  return segments[segments.length - 1];
};

/**
 * Posts local files to the server's `/upload` endpoint as multipart field `file`.
 * Failures are logged, never thrown: callers fire and forget.
 */
export class FileUploader {
  private readonly client: AxiosInstance;

  constructor(
    private readonly files: FileSource,
    client?: AxiosInstance,
  ) {
    this.client = client ?? axios.create({ baseURL: UPLOAD_BASE_URL });
  }

  async uploadFile(filePath: string): Promise<void> {
    try {
      if (!(await this.files.exists(filePath))) {
        console.log(`File does not exist: ${filePath}`);
        return;
      }

      const bytes = await this.files.read(filePath);
      const formData = new FormData();
      formData.append('file', new Blob([Uint8Array.from(bytes)]), fileNameFromPath(filePath));

      const response = await this.client.post<unknown>('/upload', formData);
      console.log('Server response:', response.data);
    } catch (error) {
      console.error(`Error uploading file: ${toApiError(error, 'unknown error').message}`);
    }
  }
}
