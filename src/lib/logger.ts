import pino from 'pino'

/** Root logger. LOG_LEVEL=silent keeps test output clean. */
export const logger = pino({
  name: 'survey-prep',
  level: process.env.LOG_LEVEL || 'info',
  base: null,
})
