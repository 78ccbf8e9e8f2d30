import { facility, SILENT_CONFIG } from '../logging/facility.js';
import { AdmissionGuard } from './admissionGuard.js';
import { ExclusiveLock } from './exclusiveLock.js';

// Realm-wide singletons. Each test worker has its own module graph, so these
// are shared by every test running in the same file/worker.
let admission = new AdmissionGuard((config) => facility.apply(config));
let lock = new ExclusiveLock();

export function globalAdmission(): AdmissionGuard {
  return admission;
}

export function globalLock(): ExclusiveLock {
  return lock;
}

// Test-only: forget any initialization and start from a silent facility
export async function __resetGlobalStateForTests(): Promise<void> {
  admission = new AdmissionGuard((config) => facility.apply(config));
  lock = new ExclusiveLock();
  await facility.apply(SILENT_CONFIG);
}
