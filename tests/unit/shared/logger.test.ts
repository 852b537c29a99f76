import { logger } from '@/shared/utils/logger'

describe('logger', () => {
  let debugWasEnabled: boolean

  beforeEach(() => {
    debugWasEnabled = logger.isDebugEnabled()
  })

  afterEach(() => {
    logger.setDebug(debugWasEnabled)
    jest.restoreAllMocks()
  })

  it('tags scoped lines with the level and component', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined)

    logger.scope('RateSampler').warn('Already running')

    expect(warn).toHaveBeenCalledWith('[WARN]', '[RateSampler]', 'Already running')
  })

  it('passes extra arguments through', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined)
    const failure = new Error('surface gone')

    logger.scope('OverlayVisibility').error('Failed to remove surface:', failure)

    expect(error).toHaveBeenCalledWith('[ERROR]', '[OverlayVisibility]', 'Failed to remove surface:', failure)
  })

  it('writes debug lines only while debug output is enabled', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined)
    const log = logger.scope('GestureClassifier')

    logger.setDebug(false)
    log.debug('hidden')
    expect(debug).not.toHaveBeenCalled()

    logger.setDebug(true)
    log.debug('shown')
    expect(debug).toHaveBeenCalledWith('[DEBUG]', '[GestureClassifier]', 'shown')
  })
})
