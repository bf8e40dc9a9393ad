import pino from 'pino'
import { config } from './config'

export const logger = pino({
  name: 'json-api-codec',
  level: config.logLevel,
})
