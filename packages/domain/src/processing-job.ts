export type ProcessingType =
  | 'THUMBNAIL_GENERATION'
  | 'IMAGE_RESIZE'
  | 'COMPRESSION'
  | 'FORMAT_CONVERSION'
  | 'METADATA_EXTRACTION'
  | 'VARIANT_GENERATION'
  | 'VIDEO_TRANSCODING'
  | 'AUDIO_TRANSCODING'
  | 'CONTENT_ANALYSIS'
  | 'TEXT_EXTRACTION';

export type ProcessingStatus = 'PENDING' | 'QUEUED' | 'PROCESSING' | 'COMPLETED' | 'FAILED' | 'CANCELLED';

export interface ProcessingJob {
  id: string;
  mediaId: string;
  processingType: ProcessingType;
  status: ProcessingStatus;
  priority: number;
  parameters: Record<string, unknown>;
  progress: number;
  resultUrl: string | null;
  resultMetadata: Record<string, unknown> | null;
  errorMessage: string | null;
  workerId: string | null;
  retryCount: number;
  maxRetries: number;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

export interface NewProcessingJob {
  id: string;
  mediaId: string;
  processingType: ProcessingType;
  parameters: Record<string, unknown>;
  priority?: number;
  maxRetries?: number;
}

export const DEFAULT_PRIORITY = 5;
export const DEFAULT_MAX_RETRIES = 3;

export function createProcessingJob(input: NewProcessingJob, now: Date = new Date()): ProcessingJob {
  const priority = input.priority ?? DEFAULT_PRIORITY;
  const maxRetries = input.maxRetries ?? DEFAULT_MAX_RETRIES;
  if (!input.mediaId) {
    throw new ProcessingJobError('VALIDATION', 'Media ID is required');
  }
  if (!Number.isInteger(priority) || priority < 1 || priority > 10) {
    throw new ProcessingJobError('VALIDATION', 'Priority must be between 1 and 10');
  }
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new ProcessingJobError('VALIDATION', 'Max retries must be a non-negative integer');
  }

  return {
    id: input.id,
    mediaId: input.mediaId,
    processingType: input.processingType,
    status: 'PENDING',
    priority,
    parameters: input.parameters,
    progress: 0,
    resultUrl: null,
    resultMetadata: null,
    errorMessage: null,
    workerId: null,
    retryCount: 0,
    maxRetries,
    createdAt: now,
    startedAt: null,
    completedAt: null,
  };
}

export function queueJob(job: ProcessingJob): ProcessingJob {
  if (job.status !== 'PENDING') {
    throw new ProcessingJobError('CONFLICT', 'Can only queue pending jobs');
  }
  return { ...job, status: 'QUEUED' };
}

export function startJob(job: ProcessingJob, workerId: string, now: Date = new Date()): ProcessingJob {
  if (job.status !== 'PENDING' && job.status !== 'QUEUED') {
    throw new ProcessingJobError('CONFLICT', `Cannot start processing job in status ${job.status}`);
  }
  return { ...job, status: 'PROCESSING', startedAt: now, workerId, progress: 0 };
}

export function updateProgress(job: ProcessingJob, progress: number): ProcessingJob {
  if (job.status !== 'PROCESSING') {
    throw new ProcessingJobError('CONFLICT', 'Can only update progress for processing jobs');
  }
  if (!Number.isInteger(progress) || progress < 0 || progress > 100) {
    throw new ProcessingJobError('VALIDATION', 'Progress must be between 0 and 100');
  }
  return { ...job, progress };
}

export function completeJob(
  job: ProcessingJob,
  result: { resultUrl?: string; resultMetadata?: Record<string, unknown> } = {},
  now: Date = new Date(),
): ProcessingJob {
  if (job.status !== 'PROCESSING') {
    throw new ProcessingJobError('CONFLICT', 'Can only complete processing jobs');
  }
  return {
    ...job,
    status: 'COMPLETED',
    completedAt: now,
    progress: 100,
    resultUrl: result.resultUrl ?? null,
    resultMetadata: result.resultMetadata ?? null,
    errorMessage: null,
  };
}

export function failJob(job: ProcessingJob, errorMessage: string, now: Date = new Date()): ProcessingJob {
  if (errorMessage.trim() === '') {
    throw new ProcessingJobError('VALIDATION', 'Error message is required');
  }
  return { ...job, status: 'FAILED', completedAt: now, errorMessage };
}

export function cancelJob(job: ProcessingJob, now: Date = new Date()): ProcessingJob {
  if (job.status === 'COMPLETED') {
    throw new ProcessingJobError('CONFLICT', 'Cannot cancel completed job');
  }
  return { ...job, status: 'CANCELLED', completedAt: now };
}

export function canRetry(job: ProcessingJob): boolean {
  return job.status === 'FAILED' && job.retryCount < job.maxRetries;
}

export function retryJob(job: ProcessingJob): ProcessingJob {
  if (job.status !== 'FAILED') {
    throw new ProcessingJobError('CONFLICT', 'Can only retry failed jobs');
  }
  if (job.retryCount >= job.maxRetries) {
    throw new ProcessingJobError('CONFLICT', `Maximum retry attempts (${job.maxRetries}) exceeded`);
  }
  return {
    ...job,
    status: 'PENDING',
    retryCount: job.retryCount + 1,
    startedAt: null,
    completedAt: null,
    progress: 0,
    errorMessage: null,
    workerId: null,
  };
}

/** COMPLETED, FAILED and CANCELLED; only FAILED can leave it, through a retry. */
export function isFinished(job: ProcessingJob): boolean {
  return job.status === 'COMPLETED' || job.status === 'FAILED' || job.status === 'CANCELLED';
}

/** Null until started; a running job is measured up to `now`. */
export function processingDurationMs(job: ProcessingJob, now: Date = new Date()): number | null {
  if (!job.startedAt) return null;
  const end = job.completedAt ?? now;
  return end.getTime() - job.startedAt.getTime();
}

export class ProcessingJobError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'CONFLICT',
    message: string,
  ) {
    super(message);
    this.name = 'ProcessingJobError';
  }
}
