// Test Setup
// Keeps test output free of service log lines

import { setLogSink } from '../utils/logger.js';

setLogSink({ write() {} });
