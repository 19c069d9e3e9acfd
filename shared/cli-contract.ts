export const CLI_NAME = 'affirm'
export const CLI_VERSION = '0.1.0'

export const EXIT_CODE = {
  SUCCESS: 0,
  // Empty collection, unknown collection, bad id/kind, empty or unreadable import
  OPERATION_ERROR: 1,
  // Data file unreadable or not a storage document
  STORAGE_ERROR: 2,
  INVALID_ARGS: 3,
} as const

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE]

export const ENV_VARS = {
  dataFile: 'AFFIRMATIONS_FILE',
  historyLimit: 'AFFIRMATIONS_HISTORY_LIMIT',
  historyShow: 'AFFIRMATIONS_HISTORY_SHOW',
} as const
