import type { AnnotateInput, AnnotationApi } from '../clients/annotation-client';
import type { FilesApi, UploadInput } from '../clients/files-client';
import type { ModelApi, PredictInput } from '../clients/model-client';
import { loadConfig, type AppConfig } from '../config';
import { HttpError } from '../monitoring/error-handler';
import type { Renderer } from '../services/annotation-renderer';
import type { AnnotationResult, Detection, DownloadedFile, FileList, ModelHealth, ModelInfo, PredictResponse, StoredFile } from '../types';

export function testConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ PREVIEW_LIMIT: '3', MAX_BATCH_FILES: '5', LOG_LEVEL: 'error', ...overrides });
}

export function detection(cls: string, classRu: string, confidence: number, bbox: Detection['bbox'] = [10, 10, 50, 50]): Detection {
  return { class: cls, class_ru: classRu, confidence, bbox };
}

export function prediction(detections: Detection[], defectClasses: string[] = ['bad_insulator', 'damaged_insulator']): PredictResponse {
  const statistics: Record<string, number> = {};
  for (const d of detections) statistics[d.class] = (statistics[d.class] ?? 0) + 1;
  const defects = detections.filter((d) => defectClasses.includes(d.class)).length;
  return {
    detections,
    statistics,
    total_objects: detections.length,
    defects_count: defects,
    has_defects: defects > 0,
  };
}

export class FakeModel implements ModelApi {
  calls: PredictInput[] = [];
  byContent = new Map<string, PredictResponse | Error>();
  fallback: PredictResponse = prediction([]);
  healthResult: ModelHealth | Error = { status: 'healthy', model_loaded: true, service: 'yolov8-model-service' };
  /** хук перед каждым predict */
  beforePredict: ((input: PredictInput) => Promise<void>) | null = null;

  async health(): Promise<ModelHealth> {
    if (this.healthResult instanceof Error) throw this.healthResult;
    return this.healthResult;
  }

  async modelInfo(): Promise<ModelInfo> {
    return { model_path: 'models/best.pt', model_exists: true, classes: ['traverse'], num_classes: 1 };
  }

  async predict(input: PredictInput): Promise<PredictResponse> {
    this.calls.push(input);
    if (this.beforePredict) await this.beforePredict(input);
    const scripted = this.byContent.get(input.buffer.toString());
    if (scripted instanceof Error) throw scripted;
    return scripted ?? this.fallback;
  }
}

interface StoredBlob extends DownloadedFile {
  fileType: string;
  projectId: string;
}

export class FakeFiles implements FilesApi {
  stored = new Map<string, StoredBlob>();
  deleted: string[] = [];
  failUploadsAfter = Infinity;
  private seq = 0;

  put(id: string, content: string, contentType = 'image/jpeg'): void {
    this.stored.set(id, { buffer: Buffer.from(content), contentType, filename: `${id}.jpg`, fileType: 'IMAGE', projectId: '' });
  }

  async upload(input: UploadInput): Promise<StoredFile> {
    if (this.seq >= this.failUploadsAfter) throw new HttpError(503, 'Не удалось подключиться к файлового сервиса');
    this.seq += 1;
    const id = `file-${this.seq}`;
    this.stored.set(id, {
      buffer: input.buffer,
      contentType: input.contentType,
      filename: input.filename,
      fileType: input.fileType,
      projectId: input.projectId,
    });
    return { id, original_filename: input.filename, file_type: input.fileType, project_id: input.projectId };
  }

  async download(fileId: string): Promise<DownloadedFile> {
    const file = this.stored.get(fileId);
    if (!file) throw new HttpError(404, 'Файл не найден');
    return { buffer: file.buffer, contentType: file.contentType, filename: file.filename };
  }

  async getMetadata(fileId: string): Promise<StoredFile> {
    const file = this.stored.get(fileId);
    if (!file) throw new HttpError(404, 'Файл не найден');
    return { id: fileId, original_filename: file.filename, content_type: file.contentType, size: file.buffer.length };
  }

  async listProject(projectId: string): Promise<FileList> {
    const files: StoredFile[] = [];
    for (const [id, file] of this.stored) {
      if (file.projectId === projectId) files.push({ id, original_filename: file.filename, file_type: file.fileType, project_id: projectId });
    }
    return { files, total: files.length };
  }

  async delete(fileId: string): Promise<void> {
    this.deleted.push(fileId);
    if (!this.stored.delete(fileId)) throw new HttpError(404, 'Файл не найден');
  }
}

export class FakeRenderer implements Renderer {
  rendered: Detection[][] = [];
  fail = false;

  async render(_image: Buffer, detections: Detection[]): Promise<Buffer> {
    if (this.fail) throw new Error('render failed');
    this.rendered.push(detections);
    return Buffer.from('rendered');
  }
}

export class FakeAnnotation implements AnnotationApi {
  calls: AnnotateInput[] = [];
  result: AnnotationResult = { success: true, file_id: 'annotated-1', filename: 'a.jpg', message: 'Image annotated successfully' };

  async annotate(input: AnnotateInput): Promise<AnnotationResult> {
    this.calls.push(input);
    return this.result;
  }
}
