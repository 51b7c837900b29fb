// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import type { ScanError } from '../services/error-handling.js';
import type { ActivityLogger } from './activity-logger.js';
import type { Result } from './result.js';
import type { TargetInfo } from './scan.js';

/**
 * One self-contained probe category. Expected failures come back as an
 * Err; implementations do not throw for them.
 */
export interface Analyzer<T> {
  readonly name: string;
  run(target: TargetInfo, logger: ActivityLogger): Promise<Result<T, ScanError>>;
}
