// queued → processing → completed | failed
export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export interface AnalysisJob {
  id: number;
  repositoryId: number;
  status: JobStatus;
  taskId: string | null;
  progressPercentage: number;
  errorMessage: string | null;
  startedAt: Date | null;
  completedAt: Date | null;
  createdAt: Date;
}

export interface NewAnalysisJob {
  repositoryId: number;
  status: JobStatus;
  taskId: string | null;
  progressPercentage: number;
  startedAt: Date | null;
}

export type AnalysisJobPatch = Partial<
  Pick<AnalysisJob, 'status' | 'taskId' | 'progressPercentage' | 'errorMessage' | 'startedAt' | 'completedAt'>
>;

export const JOB_STATUSES: readonly JobStatus[] = ['queued', 'processing', 'completed', 'failed'];

export function isJobStatus(value: unknown): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}
