/**
 * Browser execution module.
 * Form drivers: Playwright for real runs, an in-process simulation for
 * dry runs and tests. No orchestration logic lives here.
 */

export type { DriverFactory, FormDriver, LaunchOptions } from './driver.js';
export { resolveSelector, questionContainer, buttonNamed } from './selectors.js';
export { createPlaywrightFactory } from './runner.js';
export type { PlaywrightDriverConfig } from './runner.js';
export { createSimulatedFactory } from './simulated.js';
export type {
  SimulatedCall,
  SimulatedDriverFactory,
  SimulatedDriverOptions,
  SimulatedFault,
  SimulatedOperation,
  SimulatedStats,
} from './simulated.js';
