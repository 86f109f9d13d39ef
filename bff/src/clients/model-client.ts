import axios, { type AxiosInstance } from 'axios';
import { fromUpstream } from '../monitoring/error-handler';
import { createLogger } from '../logger';
import type { ModelHealth, ModelInfo, PredictResponse } from '../types';
import { filePart, type UploadPart } from './multipart';

const log = createLogger('YOLO');
const SERVICE = 'сервиса модели YOLOv8';

export interface ModelTimeouts {
  predictMs: number;
  modelInfoMs: number;
  healthMs: number;
}

export interface PredictInput extends UploadPart {
  conf: number;
}

export interface ModelApi {
  health(): Promise<ModelHealth>;
  modelInfo(): Promise<ModelInfo>;
  predict(input: PredictInput): Promise<PredictResponse>;
}

export class ModelClient implements ModelApi {
  private client: AxiosInstance;

  constructor(baseURL: string, private timeouts: ModelTimeouts) {
    this.client = axios.create({ baseURL });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        const mapped = fromUpstream(error, SERVICE);
        log.warn(`request failed: ${mapped.status} ${mapped.message}`);
        return Promise.reject(mapped);
      },
    );
  }

  async health(): Promise<ModelHealth> {
    const { data } = await this.client.get<ModelHealth>('/health', { timeout: this.timeouts.healthMs });
    return data;
  }

  async modelInfo(): Promise<ModelInfo> {
    const { data } = await this.client.get<ModelInfo>('/model/info', { timeout: this.timeouts.modelInfoMs });
    return data;
  }

  async predict(input: PredictInput): Promise<PredictResponse> {
    const form = filePart(new FormData(), 'file', input);
    log.debug(`predict ${input.filename} (${input.buffer.length} bytes, conf=${input.conf})`);
    const { data } = await this.client.post<PredictResponse>('/predict', form, {
      params: { conf: input.conf },
      timeout: this.timeouts.predictMs,
    });
    return data;
  }
}
