
export const httpStatusCode = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const

export const API_KEY_HEADER = "x-api-key"

export const DEFAULT_SETTINGS_ID = "DEFAULT_SETTINGS"

export const LINK_STATISTICS_SEQUENCE = "link_statistics"
