/**
 * Vitest Setup File
 *
 * Silences the global logger so test output stays readable.
 */

import { vi } from 'vitest';
import { getLogger } from '../src/shared/services/logging.service.js';

getLogger().setMinLevel('silent');

// eslint-disable-next-line @typescript-eslint/no-empty-function
vi.spyOn(console, 'warn').mockImplementation(() => {});
