import { createLogger } from '@certwatch/logger'

export const logger = createLogger('maintainer')

export const loggers = {
  fetch: logger.child('fetch'),
  validator: logger.child('validator'),
  discovery: logger.child('discovery'),
  reconcile: logger.child('reconcile'),
  repair: logger.child('repair'),
  store: logger.child('store'),
  cli: logger.child('cli'),
}
