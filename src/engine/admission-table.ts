import { Injectable } from '@nestjs/common';

export type AdmissionResult =
  | { acquired: true }
  | { acquired: false; holder: string };

/**
 * Process-wide record of which run holds each (pipeline, logical key).
 * Acquisition is a synchronous compare-and-set, so two triggers racing for the
 * same key cannot both be admitted.
 */
@Injectable()
export class AdmissionTable {
  private readonly holders = new Map<string, string>();

  tryAcquire(pipelineId: string, logicalKey: string, runId: string): AdmissionResult {
    const key = admissionKey(pipelineId, logicalKey);
    const holder = this.holders.get(key);
    if (holder !== undefined && holder !== runId) {
      return { acquired: false, holder };
    }
    this.holders.set(key, runId);
    return { acquired: true };
  }

  /** Releases the key only if `runId` still holds it. */
  release(pipelineId: string, logicalKey: string, runId: string): boolean {
    const key = admissionKey(pipelineId, logicalKey);
    if (this.holders.get(key) !== runId) {
      return false;
    }
    this.holders.delete(key);
    return true;
  }

  holder(pipelineId: string, logicalKey: string): string | undefined {
    return this.holders.get(admissionKey(pipelineId, logicalKey));
  }

  get size(): number {
    return this.holders.size;
  }
}

function admissionKey(pipelineId: string, logicalKey: string): string {
  return JSON.stringify([pipelineId, logicalKey]);
}
