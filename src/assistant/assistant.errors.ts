import { TimeoutError } from '../shared/utils/timeout';

export class GenerationTimeoutError extends TimeoutError {
  constructor(timeoutMs: number) {
    super('Answer generation', timeoutMs);
    this.name = 'GenerationTimeoutError';
  }
}
