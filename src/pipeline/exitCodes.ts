/** Process exit codes. NO_CHANGE is a successful run that published nothing. */
export const ExitCodes = {
  PUBLISHED: 0,
  UNEXPECTED: 1,
  CONFIG_ERROR: 2,
  NO_CHANGE: 3,
  PRECHECK_FAILED: 4,
  FETCH_FAILED: 5,
  BUILD_FAILED: 6,
  PUBLISH_FAILED: 7,
  EXTERNAL_PUBLISH_FAILED: 8,
  LOCKED: 9
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
