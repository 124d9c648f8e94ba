import 'winston';
import { LeveledLogMethod } from 'winston';

// Levels registered in logger.ts on top of the npm defaults
declare module 'winston' {
    interface Logger {
        fatal: LeveledLogMethod;
        perf: LeveledLogMethod;
        trace: LeveledLogMethod;
        cons: LeveledLogMethod;
    }
}
