import * as fs from 'fs';
import * as path from 'path';
import { ClassifierName } from '../errors/app-errors';

// Resolve from project root (2 levels up from dist/classification/ or src/classification/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const PROMPTS_DIR = path.resolve(PROJECT_ROOT, 'prompts');

export type ClassifierPrompts = Record<ClassifierName, string>;

const PROMPT_FILES: Readonly<Record<ClassifierName, string>> = {
  intent: 'intent.md',
  language: 'language.md',
  governance: 'governance.md',
};

export function loadPrompts(dir: string = PROMPTS_DIR): ClassifierPrompts {
  const read = (name: ClassifierName) => fs.readFileSync(path.join(dir, PROMPT_FILES[name]), 'utf-8').trim();
  return { intent: read('intent'), language: read('language'), governance: read('governance') };
}
