import { CommandResult } from '../types';

/** Issues one debugger command and reads its response. */
export interface ToolExecutor {
  execute(command: string, timeoutSeconds: number): Promise<CommandResult>;
}
