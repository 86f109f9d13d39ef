export interface UploadPart {
  buffer: Buffer;
  filename: string;
  contentType: string;
}

/** Собирает multipart/form-data на встроенных FormData/Blob. */
export function filePart(form: FormData, field: string, part: UploadPart): FormData {
  const blob = new Blob([new Uint8Array(part.buffer)], { type: part.contentType || 'application/octet-stream' });
  form.append(field, blob, part.filename);
  return form;
}
