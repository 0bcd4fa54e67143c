import { silenceLogging } from '@chordcast/core';

silenceLogging();
