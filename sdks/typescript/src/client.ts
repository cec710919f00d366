import type { HealthResponse, PendingResult, PredictOptions, PredictResponse, ResultResponse } from './types.js';

export interface ModelApiClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class ModelApiError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(message: string, status: number, body: string) {
    super(message);
    this.name = 'ModelApiError';
    this.status = status;
    this.body = body;
  }
}

export function isPending(result: ResultResponse): result is PendingResult {
  return result.timestamp === null;
}

export class ModelApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: ModelApiClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async health(): Promise<HealthResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });
    return this.readJson<HealthResponse>(response, 'Health check');
  }

  /** Uploads a frame. Resolves once the service has accepted it, not once it is inferred. */
  async predict(image: Buffer, options: PredictOptions = {}): Promise<PredictResponse> {
    if (image.length === 0) {
      throw new Error('image must not be empty');
    }
    const form = new FormData();
    const blob = new Blob([new Uint8Array(image)], { type: options.contentType ?? 'image/jpeg' });
    form.append('image', blob, options.fileName ?? 'frame.jpg');

    const response = await this.fetchImpl(`${this.baseUrl}/predict/`, {
      method: 'POST',
      headers: this.defaultHeaders,
      body: form,
    });
    return this.readJson<PredictResponse>(response, 'Predict');
  }

  async getResult(): Promise<ResultResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/result/`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });
    return this.readJson<ResultResponse>(response, 'Result');
  }

  private async readJson<T>(response: Response, label: string): Promise<T> {
    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new ModelApiError(`${label} request failed with ${response.status}: ${body}`, response.status, body);
    }
    return (await response.json()) as T;
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
