/**
 * Per-operation confirmation for interactive execute runs
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { describeOperation } from './report';
import { Operation } from './types';

/** yes: apply, no: skip this one, all: apply this and the rest, quit: stop and keep the session */
export type ConfirmAnswer = 'yes' | 'no' | 'all' | 'quit';

export interface OperationConfirmer {
  confirm(operation: Operation, position: number, total: number): Promise<ConfirmAnswer>;
}

export class InquirerConfirmer implements OperationConfirmer {
  async confirm(operation: Operation, position: number, total: number): Promise<ConfirmAnswer> {
    const answer = await inquirer.prompt<{ action: ConfirmAnswer }>([
      {
        type: 'list',
        name: 'action',
        message: `[${position}/${total}] ${describeOperation(operation)}?`,
        choices: [
          { name: 'Apply', value: 'yes' },
          { name: 'Skip', value: 'no' },
          { name: 'Apply this and all remaining', value: 'all' },
          { name: chalk.yellow('Stop here (resume later)'), value: 'quit' },
        ],
      },
    ]);
    return answer.action;
  }
}
