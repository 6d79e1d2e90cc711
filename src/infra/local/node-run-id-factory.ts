import { randomUUID } from 'node:crypto';
import type { RunIdFactoryPort } from '../../ports/run-id.port.js';

export class NodeRunIdFactory implements RunIdFactoryPort {
  next(): string {
    return `run_${randomUUID()}`;
  }
}
