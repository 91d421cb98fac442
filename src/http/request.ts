import { PeriodSchema } from "../config/profile";

export class RequestError extends Error {
  constructor(message: string, public status: number) {
    super(message);
  }
}

export interface UploadedFile {
  name: string;
  bytes: Buffer;
}

export interface UploadRequest {
  file: UploadedFile;
  year: number;
  month: number;
  anchorName?: string;
}

export interface UploadLimits {
  max_upload_bytes: number;
}

function tooLarge(limits: UploadLimits): RequestError {
  return new RequestError(`Upload exceeds ${limits.max_upload_bytes} bytes`, 413);
}

async function readForm(request: Request): Promise<FormData> {
  const contentType = request.headers.get("content-type") ?? "";
  if (!contentType.toLowerCase().startsWith("multipart/form-data")) {
    throw new RequestError("Expected a multipart/form-data upload", 400);
  }
  try {
    return await request.formData();
  } catch (error) {
    throw new RequestError(
      `Malformed upload: ${error instanceof Error ? error.message : String(error)}`,
      400
    );
  }
}

function textField(form: FormData, name: string): string | undefined {
  const value = form.get(name);
  return typeof value === "string" ? value.trim() : undefined;
}

export async function parseUploadRequest(request: Request, limits: UploadLimits): Promise<UploadRequest> {
  const declaredLength = Number.parseInt(request.headers.get("content-length") ?? "", 10);
  if (Number.isFinite(declaredLength) && declaredLength > limits.max_upload_bytes) {
    throw tooLarge(limits);
  }

  const form = await readForm(request);

  const entry = form.get("file");
  if (!entry || typeof entry === "string") {
    throw new RequestError("Missing file field", 400);
  }
  if (!entry.name) {
    throw new RequestError("Uploaded file has no name", 400);
  }
  if (entry.size > limits.max_upload_bytes) {
    throw tooLarge(limits);
  }

  const monthParam = textField(form, "month");
  const yearParam = textField(form, "year");
  if (!monthParam) {
    throw new RequestError("Missing month parameter", 400);
  }
  if (!yearParam) {
    throw new RequestError("Missing year parameter", 400);
  }

  const period = PeriodSchema.safeParse({ year: yearParam, month: monthParam });
  if (!period.success) {
    const field = period.error.issues[0]?.path.join(".") ?? "period";
    throw new RequestError(`Invalid ${field} parameter`, 400);
  }

  return {
    file: {
      name: entry.name,
      bytes: Buffer.from(await entry.arrayBuffer())
    },
    year: period.data.year,
    month: period.data.month,
    anchorName: textField(form, "name") || undefined
  };
}
