import {describeArguments} from './util';

/**
Thrown when a matrix is constructed from arguments that match none of the
accepted shapes. The offending arguments are kept on `args`.
*/
export class InvalidArgumentError extends Error {
  constructor(public readonly args: readonly unknown[]) {
    super(`Invalid arguments: (${describeArguments(args)})`);
    this.name = 'InvalidArgumentError';
  }
}
