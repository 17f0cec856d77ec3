/**
 * User-visible notifications.
 *
 * Core modules report recoverable failures (a page that failed to load, a
 * backtrace request that errored) through a `Notifier`. The default one
 * shows a dismissable sonner toast; the host renders sonner's `<Toaster />`.
 */

import { toast } from 'sonner';
import { DebuggerConfig, DEFAULT_DEBUGGER_CONFIG } from '../config';

export interface Notifier {
  error(message: string): void;
  info(message: string): void;
  success(message: string): void;
}

export function createToastNotifier(
  config: Pick<DebuggerConfig, 'notificationDurationMs'> = DEFAULT_DEBUGGER_CONFIG,
): Notifier {
  const duration = config.notificationDurationMs;
  return {
    error: (message) => {
      toast.error(message, { duration });
    },
    info: (message) => {
      toast.info(message, { duration });
    },
    success: (message) => {
      toast.success(message, { duration });
    },
  };
}
