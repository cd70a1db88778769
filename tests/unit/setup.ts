import { LogHandler } from '@/utilities/log-handler';

// Keep the log history for assertions, but off the test output
LogHandler.getLogManager().consoleEnabled = false;
