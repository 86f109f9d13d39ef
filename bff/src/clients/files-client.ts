import axios, { type AxiosInstance } from 'axios';
import { fromUpstream, HttpError } from '../monitoring/error-handler';
import { createLogger } from '../logger';
import type { DownloadedFile, FileList, FileType, StoredFile } from '../types';
import { filePart, type UploadPart } from './multipart';

const log = createLogger('Files');
const SERVICE = 'файлового сервиса';

export interface UploadInput extends UploadPart {
  projectId: string;
  fileType: FileType;
}

export interface FilesApi {
  upload(input: UploadInput): Promise<StoredFile>;
  download(fileId: string): Promise<DownloadedFile>;
  getMetadata(fileId: string): Promise<StoredFile>;
  listProject(projectId: string): Promise<FileList>;
  delete(fileId: string): Promise<void>;
}

function filenameFromDisposition(header: unknown): string | undefined {
  if (typeof header !== 'string') return undefined;
  const star = /filename\*=UTF-8''([^;]+)/i.exec(header);
  if (star?.[1]) return decodeURIComponent(star[1]);
  const plain = /filename="?([^";]+)"?/i.exec(header);
  return plain?.[1];
}

export class FilesClient implements FilesApi {
  private client: AxiosInstance;

  constructor(baseURL: string, timeoutMs = 60_000) {
    this.client = axios.create({ baseURL, timeout: timeoutMs, maxBodyLength: Infinity, maxContentLength: Infinity });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        const mapped = fromUpstream(error, SERVICE);
        return Promise.reject(mapped.status === 404 ? new HttpError(404, 'Файл не найден') : mapped);
      },
    );
  }

  async upload(input: UploadInput): Promise<StoredFile> {
    const form = filePart(new FormData(), 'file', input);
    form.append('project_id', input.projectId);
    form.append('file_type', input.fileType);
    const { data } = await this.client.post<StoredFile>('/files/upload', form);
    log.debug(`uploaded ${input.filename} as ${input.fileType} -> ${data.id}`);
    return data;
  }

  async download(fileId: string): Promise<DownloadedFile> {
    const response = await this.client.get<ArrayBuffer>(`/files/${encodeURIComponent(fileId)}/download`, {
      responseType: 'arraybuffer',
    });
    const contentType = response.headers['content-type'];
    return {
      buffer: Buffer.from(response.data),
      contentType: typeof contentType === 'string' ? contentType : 'application/octet-stream',
      filename: filenameFromDisposition(response.headers['content-disposition']),
    };
  }

  async getMetadata(fileId: string): Promise<StoredFile> {
    const { data } = await this.client.get<StoredFile>(`/files/${encodeURIComponent(fileId)}`);
    return data;
  }

  async listProject(projectId: string): Promise<FileList> {
    const { data } = await this.client.get<FileList>(`/files/project/${encodeURIComponent(projectId)}`);
    return data;
  }

  async delete(fileId: string): Promise<void> {
    await this.client.delete(`/files/${encodeURIComponent(fileId)}`);
  }
}
