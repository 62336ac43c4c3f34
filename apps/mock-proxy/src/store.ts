/**
 * In-memory log of message requests received by the mock proxy
 */

export interface RecordedRequest {
  id: string;
  model: string;
  resolvedModel: string;
  stream: boolean;
  thinking: boolean;
  maxTokens: number;
  status: number;
  receivedAt: number;
}

export interface StoreStats {
  total: number;
  streaming: number;
  failed: number;
  byModel: Record<string, number>;
}

export class RequestStore {
  private requests: RecordedRequest[] = [];
  private counter = 0;

  generateId(): string {
    this.counter++;
    const timestamp = Date.now().toString(36);
    const counter = this.counter.toString().padStart(6, "0");
    return `msg_mock_${timestamp}${counter}`;
  }

  add(request: Omit<RecordedRequest, "receivedAt">): RecordedRequest {
    const stored: RecordedRequest = { ...request, receivedAt: Date.now() };
    this.requests.push(stored);
    return stored;
  }

  getAll(): RecordedRequest[] {
    return [...this.requests];
  }

  getStats(): StoreStats {
    const byModel: Record<string, number> = {};
    for (const r of this.requests) {
      byModel[r.resolvedModel] = (byModel[r.resolvedModel] ?? 0) + 1;
    }
    return {
      total: this.requests.length,
      streaming: this.requests.filter((r) => r.stream).length,
      failed: this.requests.filter((r) => r.status >= 400).length,
      byModel,
    };
  }

  reset(): void {
    this.requests = [];
    this.counter = 0;
  }
}
