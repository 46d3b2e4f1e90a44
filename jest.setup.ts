import { relayLogger } from './shared/RelayLogger';

relayLogger.setLevel('silent');
