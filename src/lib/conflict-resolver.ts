/**
 * Interactive conflict resolver with diff display
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { diffLines } from 'diff';
import { FieldMapper, normalizeText, sameStatus } from './field-mapper';
import { RemoteIssue, Story } from './types';

export interface StoryConflict {
  story: Story;
  remote: RemoteIssue;
}

export type ConflictResolution = 'local' | 'remote' | 'skip';

/**
 * Decides a story changed on both sides when the strategy is `manual`
 */
export interface ConflictResolver {
  resolve(conflict: StoryConflict): Promise<ConflictResolution>;
}

type Prompt = (conflict: StoryConflict) => Promise<ConflictResolution | 'skip-all'>;

export class InteractiveConflictResolver implements ConflictResolver {
  private mapper = new FieldMapper();
  private skipAll = false;
  private seen = 0;
  private prompt: Prompt;
  private print: (line: string) => void;

  constructor(options: { prompt?: Prompt; print?: (line: string) => void } = {}) {
    this.prompt = options.prompt ?? askResolution;
    this.print = options.print ?? ((line) => console.log(line));
  }

  async resolve(conflict: StoryConflict): Promise<ConflictResolution> {
    this.seen++;
    if (this.skipAll) {
      return 'skip';
    }

    this.showConflict(conflict);

    const answer = await this.prompt(conflict);
    if (answer === 'skip-all') {
      this.skipAll = true;
      return 'skip';
    }
    return answer;
  }

  /**
   * Field-by-field differences between the local story and the remote issue
   */
  describeConflict({ story, remote }: StoryConflict): string[] {
    const lines: string[] = [];

    if (story.title.trim() !== remote.summary.trim()) {
      lines.push(chalk.bold('Title:'));
      lines.push(chalk.red(`  Local:  ${story.title}`));
      lines.push(chalk.green(`  Remote: ${remote.summary}`));
      lines.push('');
    }

    const localBody = normalizeText(this.mapper.storyDescription(story));
    const remoteBody = normalizeText(remote.description);
    if (localBody !== remoteBody) {
      lines.push(chalk.bold('Description:'));
      for (const part of diffLines(localBody, remoteBody)) {
        const partLines = part.value.split('\n').filter((line) => line);
        if (part.removed) {
          partLines.forEach((line) => lines.push(chalk.red(`  - ${line}`)));
        } else if (part.added) {
          partLines.forEach((line) => lines.push(chalk.green(`  + ${line}`)));
        }
      }
      lines.push('');
    }

    if (!sameStatus(story.status, remote.status)) {
      lines.push(chalk.bold('Status:'));
      lines.push(chalk.red(`  Local:  ${story.status}`));
      lines.push(chalk.green(`  Remote: ${remote.status}`));
      lines.push('');
    }

    if (story.subtasks.length !== remote.subtasks.length) {
      lines.push(chalk.bold('Subtasks:'));
      lines.push(chalk.red(`  Local:  ${story.subtasks.length}`));
      lines.push(chalk.green(`  Remote: ${remote.subtasks.length}`));
      lines.push('');
    }

    return lines;
  }

  private showConflict(conflict: StoryConflict): void {
    this.print(chalk.bold(`\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`));
    this.print(chalk.bold.cyan(`Conflict ${this.seen}: ${conflict.story.id} ↔ #${conflict.remote.key}`));
    this.print(chalk.bold(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n`));
    this.print(chalk.gray('Changed locally and in the tracker since the last sync'));
    this.print('');

    const lines = this.describeConflict(conflict);
    if (lines.length === 0) {
      this.print(chalk.gray('  (Only subtask details differ)'));
      this.print('');
    }
    lines.forEach((line) => this.print(line));
  }
}

async function askResolution(conflict: StoryConflict): Promise<ConflictResolution | 'skip-all'> {
  const answer = await inquirer.prompt<{ action: ConflictResolution | 'skip-all' }>([
    {
      type: 'list',
      name: 'action',
      message: `How do you want to resolve ${conflict.story.id}?`,
      choices: [
        { name: chalk.red('Use local version (update the tracker)'), value: 'local' },
        { name: chalk.green('Keep remote version (leave the tracker as is)'), value: 'remote' },
        { name: chalk.yellow('Skip this story for now'), value: 'skip' },
        { name: chalk.gray('Skip all remaining conflicts'), value: 'skip-all' },
      ],
    },
  ]);
  return answer.action;
}
