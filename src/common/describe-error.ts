export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** HTTP status from an axios error (`response.status`) or an SDK error (`status`). */
export function httpStatusOf(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  const response = error['response'];
  const status = isRecord(response) ? response['status'] : error['status'];
  return typeof status === 'number' ? status : undefined;
}

export function errorCodeOf(error: unknown): string | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  const cause = error['cause'];
  const code = error['code'] ?? (isRecord(cause) ? cause['code'] : undefined);
  return typeof code === 'string' ? code : undefined;
}

/** One-line summary: message, status, code and a truncated response body. */
export function describeError(error: unknown): string {
  if (!error) return 'Unknown error';
  const parts: string[] = [errorMessage(error)];
  const status = httpStatusOf(error);
  if (status) parts.push(`status=${status}`);
  const code = errorCodeOf(error);
  if (code) parts.push(`code=${code}`);
  const response = isRecord(error) ? error['response'] : undefined;
  const data = isRecord(response) ? safeStringify(response['data']) : undefined;
  if (data) parts.push(`data=${data}`);
  return parts.filter(Boolean).join(' | ');
}

export function safeStringify(value: unknown, maxLength = 500): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  try {
    let serialized: string;
    if (typeof value === 'string') {
      serialized = value;
    } else if (Buffer.isBuffer(value)) {
      serialized = value.toString('utf8');
    } else if (value instanceof ArrayBuffer) {
      serialized = Buffer.from(value).toString('utf8');
    } else {
      serialized = JSON.stringify(value);
    }
    if (!serialized) return undefined;
    return serialized.length > maxLength ? `${serialized.slice(0, maxLength)}...` : serialized;
  } catch {
    return undefined;
  }
}
