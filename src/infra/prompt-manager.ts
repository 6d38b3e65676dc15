import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import Mustache from 'mustache';

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

export class PromptManager {
  private static instance: PromptManager;

  /** Templates live in src/prompts, next to this module's parent directory */
  constructor(private promptDir: string = path.resolve(moduleDir, '..', 'prompts')) {}

  public static getInstance(): PromptManager {
    if (!PromptManager.instance) {
      PromptManager.instance = new PromptManager();
    }
    return PromptManager.instance;
  }

  public render(templateName: string, data: Record<string, unknown>): string {
    const filePath = path.join(this.promptDir, `${templateName}.mustache`);
    if (!fs.existsSync(filePath)) {
      throw new Error(`Prompt template not found: ${filePath}`);
    }
    const template = fs.readFileSync(filePath, 'utf-8');
    return Mustache.render(template, data);
  }
}
