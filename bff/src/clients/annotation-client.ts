import axios, { type AxiosInstance } from 'axios';
import { fromUpstream } from '../monitoring/error-handler';
import type { AnnotationResult, FileType, ManualBBox } from '../types';

export interface AnnotateInput {
  fileId: string;
  bboxes: ManualBBox[];
  projectId: string;
  fileType: FileType;
}

export interface AnnotationApi {
  annotate(input: AnnotateInput): Promise<AnnotationResult>;
}

export class AnnotationClient implements AnnotationApi {
  private client: AxiosInstance;

  constructor(baseURL: string, timeoutMs = 60_000) {
    this.client = axios.create({ baseURL, timeout: timeoutMs });
    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => Promise.reject(fromUpstream(error, 'сервиса аннотаций')),
    );
  }

  async annotate(input: AnnotateInput): Promise<AnnotationResult> {
    const { data } = await this.client.post<AnnotationResult>('/annotations/annotate', {
      file_id: input.fileId,
      bboxes: input.bboxes,
      project_id: input.projectId,
      file_type: input.fileType,
    });
    return data;
  }
}
