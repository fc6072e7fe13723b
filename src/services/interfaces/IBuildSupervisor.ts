/**
 * @file IBuildSupervisor - Continuous build hook contract
 */

import type { Result } from '../../../shared/utils';
import type { SyncBridgeError } from '../errors';
import type { ProcessRecord } from './IProcessLauncher';

export interface IBuildSupervisor {
  /**
   * Start a detached watch-and-rebuild process for `sourceFile`.
   * Resolves ok(null) when there is nothing to build; a failure is returned,
   * never thrown, since a stale PDF is still worth viewing.
   */
  startContinuousBuild(
    sourceFile: string | undefined
  ): Promise<Result<ProcessRecord | null, SyncBridgeError>>;
}
