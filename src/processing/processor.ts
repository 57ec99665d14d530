/**
 * Processing contract shared by the post pipeline stages.
 */

export type ProcessingStatus = 'ACCEPTED' | 'ERROR';

export interface ProcessingResult<T> {
  status: ProcessingStatus;
  output: T;
  processorName: string;
  details: Record<string, unknown>;
  reason?: string;
}

export abstract class Processor<TInput, TOutput = TInput> {
  abstract readonly processorName: string;

  abstract process(input: TInput): Promise<ProcessingResult<TOutput>>;

  protected accepted(output: TOutput, details: Record<string, unknown> = {}): ProcessingResult<TOutput> {
    return { status: 'ACCEPTED', output, processorName: this.processorName, details };
  }

  protected failed(output: TOutput, reason: string, details: Record<string, unknown> = {}): ProcessingResult<TOutput> {
    return { status: 'ERROR', output, processorName: this.processorName, details, reason };
  }
}
