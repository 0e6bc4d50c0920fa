/**
 * Abstraction for resolving executables on the execution path.
 */
export interface ToolLocator {
  /** Absolute path of the executable, or undefined when it can't be found */
  locate(name: string): Promise<string | undefined>;
}
