// pending → analyzing → ready | failed
export type RepositoryStatus = 'pending' | 'analyzing' | 'ready' | 'failed';

export const REPOSITORY_STATUSES: readonly RepositoryStatus[] = ['pending', 'analyzing', 'ready', 'failed'];

export interface Repository {
  id: number;
  name: string;
  repoUrl: string;
  branch: string;
  description: string | null;
  status: RepositoryStatus;
  totalFiles: number;
  totalLines: number;
  languages: Record<string, number>;
  analyzedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewRepository {
  name: string;
  repoUrl: string;
  branch: string;
  description: string | null;
}

export type RepositoryPatch = Partial<
  Pick<
    Repository,
    'name' | 'branch' | 'description' | 'status' | 'totalFiles' | 'totalLines' | 'languages' | 'analyzedAt'
  >
>;

export interface RepositoryFilter {
  status?: RepositoryStatus;
  search?: string;
  limit: number;
  offset: number;
}

export function isRepositoryStatus(value: unknown): value is RepositoryStatus {
  return REPOSITORY_STATUSES.some((status) => status === value);
}
