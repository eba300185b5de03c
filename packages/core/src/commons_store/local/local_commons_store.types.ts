/**
 * Type Definitions for LocalCommonsStore
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds */
  timeout?: number;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by LocalCommonsStore
 *
 * Commands are injected so tests can run without the dolt binary.
 */
export type LocalCommonsStoreDependencies = {
  /** Path to the local dolt database (the rig's clone of its fork) */
  dbDir: string;
  /** Function to execute shell commands (required) */
  execCommand: ExecCommand;
  /** `sync()` resets main to upstream instead of pulling (pr mode) */
  resetOnSync?: boolean;
  /** Per-command timeouts in milliseconds */
  timeouts?: {
    query?: number;
    script?: number;
    remote?: number;
  };
  /** Directory for temporary SQL scripts (default: os.tmpdir()) */
  scriptDir?: string;
};
