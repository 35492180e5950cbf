import { setLogLevel } from '../../utils/logger';

setLogLevel('silent');
