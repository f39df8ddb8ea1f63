import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { isNodeError } from '../errors.js';

/** Human-readable narrative of the project's progress, kept in progress.md. */
export class ProgressLog {
  readonly filePath: string;

  constructor(projectRoot: string, fileName = 'progress.md') {
    this.filePath = path.join(projectRoot, fileName);
  }

  async initialize(projectName: string, description: string, timestamp = new Date().toISOString()): Promise<void> {
    const content = [
      '# Project progress',
      '',
      '## Project',
      '',
      `- **Name**: ${projectName}`,
      `- **Description**: ${description || '(none)'}`,
      `- **Started**: ${timestamp}`,
      '',
      '## Log',
      '',
      `### ${timestamp}`,
      '- Project initialized',
      '',
    ].join('\n');
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, content);
  }

  async load(): Promise<string> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return '';
      throw err;
    }
  }

  async append(section: string): Promise<void> {
    await fs.appendFile(this.filePath, '\n' + section.trimEnd() + '\n');
  }
}
