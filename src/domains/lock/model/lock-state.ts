/**
 * Lifecycle of a DirectoryLock instance:
 * Created -> Taking -> Owned -> Releasing -> Created
 */
export enum LockState {
  Created = 'created',
  Taking = 'taking',
  Owned = 'owned',
  Releasing = 'releasing',
}
