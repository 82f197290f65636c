/**
 * Output Port
 *
 * What the resolve and graph commands print goes through this port, so the
 * same command code drives a terminal session or a plain log.
 */

/** Progress indicator shown while a resolution runs */
export interface ProgressSpinner {
  start(message: string): void;
  stop(finalMessage: string): void;
}

export interface OutputPort {
  info(message: string): void;
  message(message: string): void;
  success(message: string): void;
  /** Block of lines under a title, such as the resolved pins */
  note(content: string, title: string): void;
  spinner(): ProgressSpinner;
}
