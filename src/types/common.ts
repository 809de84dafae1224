export type FileStatus = 'UNCHANGED' | 'USER_MODIFIED' | 'UPSTREAM_CHANGED' | 'CONFLICT' | 'MISSING';

export type FileAction = 'create' | 'skip';

export interface FileChange {
  relativePath: string;
  status: FileStatus;
  module: string;
}
