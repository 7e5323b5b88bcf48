import {
  IProcessRunner,
  ProcessResult,
  ProcessRunOptions,
} from "./IProcessRunner";

export interface RecordedCall {
  command: string;
  args: string[];
  options?: ProcessRunOptions;
}

export class InMemoryProcessRunner implements IProcessRunner {
  private responses: Array<ProcessResult | Error> = [];
  private calls: RecordedCall[] = [];

  enqueue(response: ProcessResult): void {
    this.responses.push(response);
  }

  /** Queue a spawn failure (e.g. command not found). */
  enqueueError(error: Error): void {
    this.responses.push(error);
  }

  async run(
    command: string,
    args: string[],
    options?: ProcessRunOptions
  ): Promise<ProcessResult> {
    this.calls.push({ command, args, options });
    const response = this.responses.shift();
    if (!response) {
      throw new Error("No more canned responses in InMemoryProcessRunner");
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }

  getCalls(): RecordedCall[] {
    return [...this.calls];
  }
}
