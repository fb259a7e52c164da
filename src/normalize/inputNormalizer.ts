import { SUMMARY_ENTRY } from "../archive/assembler";
import { ExtractionTask, InvalidInputError, TaskSource } from "../types";

export interface NormalizeOptions {
  defaultDpi: number;
  maxDpi: number;
  /** String fields at least this long are treated as encoded PDF payloads. */
  minPayloadFieldLength: number;
}

type JsonRecord = Record<string, unknown>;

interface DraftTask {
  preferredId?: string;
  source: TaskSource;
  dpi?: unknown;
}

const RESERVED_FIELDS = new Set(["id", "dpi", "pdf_url", "url", "file_name", "filename", "documents"]);
const URL_PATTERN = /^https?:\/\/\S+$/i;

function isRecord(value: unknown): value is JsonRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value) && !Buffer.isBuffer(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isUrl(value: string): boolean {
  return URL_PATTERN.test(value.trim());
}

export function sanitizeId(raw: string): string {
  const cleaned = raw
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/^[._]+/, "");
  return cleaned.slice(0, 120);
}

function fileStem(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;
  return base.replace(/\.pdf$/i, "");
}

function isValidDpi(dpi: unknown, maxDpi: number): dpi is number {
  return typeof dpi === "number" && Number.isInteger(dpi) && dpi > 0 && dpi <= maxDpi;
}

function resolveDpi(value: unknown, position: number, options: NormalizeOptions): number {
  if (value === undefined || value === null) {
    if (!isValidDpi(options.defaultDpi, options.maxDpi)) {
      throw new InvalidInputError(
        `Default dpi ${options.defaultDpi} must be a positive integer no greater than ${options.maxDpi}`,
      );
    }
    return options.defaultDpi;
  }
  const dpi = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (!isValidDpi(dpi, options.maxDpi)) {
    throw new InvalidInputError(
      `Document ${position + 1}: dpi must be a positive integer no greater than ${options.maxDpi}`,
    );
  }
  return dpi;
}

function draftFromDescriptor(item: unknown, position: number): DraftTask {
  if (isNonEmptyString(item)) {
    return { source: { kind: "inline-content", content: item } };
  }
  if (!isRecord(item)) {
    throw new InvalidInputError(`Document ${position + 1}: expected an object or an encoded string`);
  }

  const explicitId = isNonEmptyString(item.id) ? item.id : undefined;
  const fileName = isNonEmptyString(item.file_name) ? item.file_name : isNonEmptyString(item.filename) ? item.filename : undefined;
  const preferredId = explicitId ?? (fileName ? fileStem(fileName) : undefined);
  const url = isNonEmptyString(item.url) ? item.url : isNonEmptyString(item.pdf_url) ? item.pdf_url : undefined;

  if (url) {
    if (!isUrl(url)) {
      throw new InvalidInputError(`Document ${position + 1}: url must be an http(s) URL`);
    }
    return { preferredId, source: { kind: "remote-url", url: url.trim() }, dpi: item.dpi };
  }
  if (isNonEmptyString(item.data)) {
    return { preferredId, source: { kind: "inline-multipart-blob", blob: item.data }, dpi: item.dpi };
  }
  if (isNonEmptyString(item.content)) {
    return { preferredId, source: { kind: "inline-content", content: item.content }, dpi: item.dpi };
  }

  throw new InvalidInputError(`Document ${position + 1}: expected one of content, data or url`);
}

function payloadFields(request: JsonRecord, minLength: number): string[] {
  return Object.keys(request)
    .filter((key) => !RESERVED_FIELDS.has(key))
    .filter((key) => {
      const value = request[key];
      return typeof value === "string" && value.trim().length >= minLength && !isUrl(value);
    })
    .sort();
}

function draftTasks(request: unknown, options: NormalizeOptions): DraftTask[] {
  if (Array.isArray(request)) {
    return request.map((item, position) => draftFromDescriptor(item, position));
  }

  if (isRecord(request)) {
    if (Array.isArray(request.documents)) {
      return request.documents.map((item, position) => draftFromDescriptor(item, position));
    }

    const fields = payloadFields(request, options.minPayloadFieldLength);
    if (fields.length > 0) {
      return fields.map((field): DraftTask => ({
        preferredId: fields.length === 1 && isNonEmptyString(request.id) ? request.id : field,
        source: { kind: "inline-multipart-blob", blob: String(request[field]) },
        dpi: request.dpi,
      }));
    }

    const url = isNonEmptyString(request.pdf_url) ? request.pdf_url : isNonEmptyString(request.url) ? request.url : undefined;
    if (url) {
      if (!isUrl(url)) {
        throw new InvalidInputError("pdf_url must be an http(s) URL");
      }
      return [
        {
          preferredId: isNonEmptyString(request.id) ? request.id : undefined,
          source: { kind: "remote-url", url: url.trim() },
          dpi: request.dpi,
        },
      ];
    }

    if (Object.keys(request).length === 0) {
      throw new InvalidInputError("Request body is empty");
    }
    throw new InvalidInputError("Request object carries no PDF payload field, pdf_url or documents list");
  }

  if (Buffer.isBuffer(request)) {
    if (request.length === 0) {
      throw new InvalidInputError("Request body is empty");
    }
    return [{ source: { kind: "inline-content", content: request } }];
  }

  if (typeof request === "string") {
    if (request.trim().length === 0) {
      throw new InvalidInputError("Request body is empty");
    }
    return [{ source: { kind: "inline-content", content: request.trim() } }];
  }

  if (request === undefined || request === null) {
    throw new InvalidInputError("Request body is empty");
  }
  throw new InvalidInputError(`Unsupported request of type ${typeof request}`);
}

function assignIds(drafts: DraftTask[]): string[] {
  const used = new Set<string>([SUMMARY_ENTRY]);
  return drafts.map((draft, position) => {
    const base = (draft.preferredId ? sanitizeId(draft.preferredId) : "") || `doc_${position + 1}`;
    let id = base;
    for (let n = 2; used.has(id); n += 1) {
      id = `${base}_${n}`;
    }
    used.add(id);
    return id;
  });
}

/**
 * Turns any accepted request shape into an ordered, non-empty task list:
 * a descriptor list, an object of long payload fields (taken in field-name
 * order), a `pdf_url` object, or a bare encoded payload.
 *
 * @throws InvalidInputError when the request is empty or matches no shape
 */
export function normalizeRequest(request: unknown, options: NormalizeOptions): ExtractionTask[] {
  const drafts = draftTasks(request, options);
  if (drafts.length === 0) {
    throw new InvalidInputError("No PDFs provided for processing");
  }

  const ids = assignIds(drafts);
  return drafts.map((draft, position) => ({
    id: ids[position],
    source: draft.source,
    options: { dpi: resolveDpi(draft.dpi, position, options) },
  }));
}
