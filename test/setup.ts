import { bridgeLogger } from '../src/logger.js';

bridgeLogger.muteConsole();
