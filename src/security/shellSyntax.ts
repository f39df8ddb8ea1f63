/**
 * A small shell-line reader: enough of POSIX sh to find the simple commands in
 * a line, their words after quote removal and their redirections. It does not
 * expand variables or globs.
 */

export interface Redirect {
  op: string;
  target: string;
}

export interface SimpleCommand {
  words: string[];
  redirects: Redirect[];
}

/** Commands joined by `|`. */
export type Pipeline = SimpleCommand[];

const KEYWORDS = new Set([
  'if', 'then', 'else', 'elif', 'fi', 'for', 'while', 'until', 'do', 'done',
  'case', 'esac', '!', '{', '}', 'time',
]);

const WRAPPERS = new Set(['env', 'nohup', 'nice', 'exec', 'command', 'builtin', 'xargs', 'timeout']);

const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

function readBalanced(input: string, start: number, open: string, close: string): number {
  let depth = 0;
  for (let i = start; i < input.length; i++) {
    const ch = input[i];
    if (ch === '\\') {
      i++;
    } else if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return input.length - 1;
}

export function parseShell(input: string): Pipeline[] {
  const pipelines: Pipeline[] = [];
  let pipeline: Pipeline = [];
  let command: SimpleCommand = { words: [], redirects: [] };
  let word = '';
  let inWord = false;
  let pendingRedirect: string | null = null;
  const heredocs: string[] = [];

  const finishWord = (): void => {
    if (!inWord) return;
    if (pendingRedirect !== null) {
      command.redirects.push({ op: pendingRedirect, target: word });
      if (pendingRedirect === '<<' || pendingRedirect === '<<-') heredocs.push(word);
      pendingRedirect = null;
    } else {
      command.words.push(word);
    }
    word = '';
    inWord = false;
  };

  const finishCommand = (): void => {
    finishWord();
    if (command.words.length > 0 || command.redirects.length > 0) pipeline.push(command);
    command = { words: [], redirects: [] };
  };

  const finishPipeline = (): void => {
    finishCommand();
    if (pipeline.length > 0) pipelines.push(pipeline);
    pipeline = [];
  };

  let i = 0;
  while (i < input.length) {
    const ch = input[i];
    const next = input[i + 1];

    if (ch === ' ' || ch === '\t') {
      finishWord();
      i++;
    } else if (ch === '\n') {
      finishPipeline();
      i++;
      // Heredoc bodies are data, not commands
      while (heredocs.length > 0 && i < input.length) {
        const end = input.indexOf('\n', i);
        const line = input.slice(i, end === -1 ? input.length : end);
        i = end === -1 ? input.length : end + 1;
        if (line.trim() === heredocs[0]) heredocs.shift();
      }
    } else if (ch === '#' && !inWord) {
      while (i < input.length && input[i] !== '\n') i++;
    } else if (ch === "'") {
      const end = input.indexOf("'", i + 1);
      const stop = end === -1 ? input.length : end;
      word += input.slice(i + 1, stop);
      inWord = true;
      i = stop + 1;
    } else if (ch === '"') {
      i++;
      while (i < input.length && input[i] !== '"') {
        if (input[i] === '\\' && i + 1 < input.length && '"\\$`'.includes(input[i + 1])) {
          word += input[i + 1];
          i += 2;
        } else {
          word += input[i];
          i++;
        }
      }
      inWord = true;
      i++;
    } else if (ch === '\\') {
      if (next === '\n') {
        i += 2;
      } else {
        if (next !== undefined) word += next;
        inWord = true;
        i += 2;
      }
    } else if (ch === '`') {
      const end = input.indexOf('`', i + 1);
      const stop = end === -1 ? input.length - 1 : end;
      word += input.slice(i, stop + 1);
      inWord = true;
      i = stop + 1;
    } else if (ch === '$' && next === '(') {
      const end = readBalanced(input, i + 1, '(', ')');
      word += input.slice(i, end + 1);
      inWord = true;
      i = end + 1;
    } else if ((ch === '<' || ch === '>') && next === '(' && !inWord) {
      const end = readBalanced(input, i + 1, '(', ')');
      word += input.slice(i, end + 1);
      inWord = true;
      i = end + 1;
    } else if (ch === ';') {
      finishPipeline();
      i += next === ';' ? 2 : 1;
    } else if (ch === '(' || ch === ')') {
      finishPipeline();
      i++;
    } else if (ch === '&') {
      if (next === '&') {
        finishPipeline();
        i += 2;
      } else if (next === '>') {
        finishWord();
        const append = input[i + 2] === '>';
        pendingRedirect = append ? '&>>' : '&>';
        i += append ? 3 : 2;
      } else {
        finishPipeline();
        i++;
      }
    } else if (ch === '|') {
      if (next === '|') {
        finishPipeline();
        i += 2;
      } else {
        finishCommand();
        i += next === '&' ? 2 : 1;
      }
    } else if (ch === '>' || ch === '<') {
      // A bare file descriptor number belongs to the operator
      if (inWord && /^\d+$/.test(word)) {
        word = '';
        inWord = false;
      } else {
        finishWord();
      }
      let op = ch;
      let j = i + 1;
      if (ch === '>') {
        if (input[j] === '>' || input[j] === '|' || input[j] === '&') op += input[j++];
      } else {
        while (input[j] === '<' && op.length < 3) op += input[j++];
        if (op === '<<' && input[j] === '-') op += input[j++];
        if (input[j] === '&' || input[j] === '>') op += input[j++];
      }
      pendingRedirect = op;
      i = j;
    } else {
      word += ch;
      inWord = true;
      i++;
    }
  }
  finishPipeline();
  return pipelines;
}

/**
 * The words from the program onwards, with leading assignments, shell
 * keywords and transparent wrappers (`env`, `nohup`, ...) skipped.
 */
export function commandWords(command: SimpleCommand): string[] {
  const words = command.words;
  let i = 0;
  while (i < words.length) {
    const w = words[i];
    if (ASSIGNMENT.test(w) || KEYWORDS.has(w)) {
      i++;
      continue;
    }
    if (WRAPPERS.has(basename(w))) {
      i++;
      while (i < words.length && (words[i].startsWith('-') || ASSIGNMENT.test(words[i]))) i++;
      if (basename(w) === 'timeout' && i < words.length && /^\d/.test(words[i])) i++;
      continue;
    }
    break;
  }
  return words.slice(i);
}

export function basename(word: string): string {
  const idx = word.lastIndexOf('/');
  return idx === -1 ? word : word.slice(idx + 1);
}
