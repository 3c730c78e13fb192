/**
 * Vitest setup file for client tests.
 * Keeps log output out of the test report; logger tests raise the level themselves.
 */

import { setLogLevel } from '../core/logger';

setLogLevel('silent');
