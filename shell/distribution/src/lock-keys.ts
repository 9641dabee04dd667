/** Mutex keys shared by the scheduler and the dispatch loop */
export const accountLockKey = (platformAccountId: string): string =>
  `account:${platformAccountId}`;

export const artifactLockKey = (artifactId: string): string =>
  `artifact:${artifactId}`;
