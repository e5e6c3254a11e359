/**
 * Test setup: keep ledger logging out of test output
 */
import { setLogLevel } from '../src/lib/logger';

beforeEach(() => {
  setLogLevel('silent');
});
