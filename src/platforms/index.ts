import { Platform } from '../types';
import { BasePlatformHandler, GenericHandler } from './base';
import { GreenhouseHandler } from './greenhouse';
import { LeverHandler } from './lever';
import { WorkableHandler } from './workable';

/**
 * Platform Registry
 *
 * Central registry for all platform handlers
 */

const handlers: Partial<Record<Platform, BasePlatformHandler>> = {
  greenhouse: new GreenhouseHandler(),
  lever: new LeverHandler(),
  workable: new WorkableHandler(),
};

const genericHandler = new GenericHandler();

/**
 * Get the appropriate handler for a platform
 */
export function getPlatformHandler(platform: Platform): BasePlatformHandler {
  return handlers[platform] ?? genericHandler;
}

export { BasePlatformHandler, GenericHandler, GreenhouseHandler, LeverHandler, WorkableHandler };
