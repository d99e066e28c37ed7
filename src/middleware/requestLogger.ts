import type { NextFunction, Request, Response } from 'express'
import logger from '../utils/logger.js'

/**
 * リクエストログ
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  logger.info(`${req.method} ${req.path} - ${req.ip}`)
  next()
}
