/**
 * Exit codes of the fsman process.
 */
export enum ExitCode {
  /**
   * The shell was left with `exit`, at the end of the input or on interrupt.
   */
  SUCCESS = 0,
  /**
   * Startup failed or an unhandled error stopped the shell.
   */
  EXECUTION_FAILURE = 1,
}
