/**
 * Command Contract
 *
 * The boundary every external step is invoked through.
 */

import * as Child from '../util/child';
import { ProcessRunner } from './types';

export { CommandBuilder } from './builder';

export const createProcessRunner = (options: Child.RunnerOptions = {}): ProcessRunner => Child.create(options);

export const serializeInput = (input: unknown): string | undefined =>
    input === undefined ? undefined : JSON.stringify(input);

export * from './types';
