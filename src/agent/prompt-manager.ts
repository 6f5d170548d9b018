import * as fs from 'fs';
import * as path from 'path';
import { PromptBundle, RestaurantInfo } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const PROMPTS_DIR = path.resolve(env.projectRoot, 'prompts');
const CONFIG_DIR = path.resolve(env.projectRoot, 'config');

const DEFAULT_SYSTEM_PROMPT = `You are a waiter at a restaurant taking orders via WhatsApp.

Keep responses SHORT and natural like a real waiter. Maximum 2-3 sentences.
Be brief, friendly, and efficient.`;

export interface PromptManagerPaths {
  systemPromptPath: string;
  restaurantInfoPath: string;
}

/**
 * Holds the system prompt and restaurant facts. Both come from files and
 * can be reloaded without a restart (POST /admin/reload-prompt).
 */
export class PromptManager {
  private bundle: PromptBundle;
  private readonly paths: PromptManagerPaths;

  constructor(paths?: Partial<PromptManagerPaths>) {
    this.paths = {
      systemPromptPath: paths?.systemPromptPath ?? path.join(PROMPTS_DIR, 'system.md'),
      restaurantInfoPath: paths?.restaurantInfoPath ?? path.join(CONFIG_DIR, 'restaurant-info.json'),
    };
    this.bundle = this.load();
  }

  reload(): PromptBundle {
    this.bundle = this.load();
    logger.info({ source: this.bundle.source }, 'Prompt and restaurant info reloaded');
    return this.bundle;
  }

  /** Full info object, or a single key of it */
  getRestaurantInfo(key?: string): unknown {
    return key ? this.bundle.restaurantInfo[key] : this.bundle.restaurantInfo;
  }

  /**
   * System prompt followed by the restaurant facts, one `key: value` per line.
   */
  renderSystemPrompt(): string {
    const info = Object.entries(this.bundle.restaurantInfo);
    if (info.length === 0) return this.bundle.system;
    const lines = info.map(([key, value]) => `${key}: ${renderInfoValue(value)}`);
    return `${this.bundle.system.trimEnd()}\n\n**RESTAURANT INFO**:\n${lines.join('\n')}`;
  }

  private load(): PromptBundle {
    const { system, source } = this.loadSystemPrompt();
    return { system, source, restaurantInfo: this.loadRestaurantInfo() };
  }

  private loadSystemPrompt(): { system: string; source: string } {
    const filepath = this.paths.systemPromptPath;
    try {
      if (fs.existsSync(filepath)) {
        const system = fs.readFileSync(filepath, 'utf-8');
        logger.info({ filepath, chars: system.length }, 'System prompt loaded');
        return { system, source: filepath };
      }
      logger.warn({ filepath }, 'System prompt file not found; using built-in default');
    } catch (err) {
      logger.error({ err, filepath }, 'Failed to read system prompt; using built-in default');
    }
    return { system: DEFAULT_SYSTEM_PROMPT, source: 'default' };
  }

  private loadRestaurantInfo(): RestaurantInfo {
    const filepath = this.paths.restaurantInfoPath;
    try {
      if (!fs.existsSync(filepath)) {
        logger.warn({ filepath }, 'Restaurant info file not found');
        return {};
      }
      const parsed: unknown = JSON.parse(fs.readFileSync(filepath, 'utf-8'));
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        return Object.fromEntries(Object.entries(parsed));
      }
      logger.warn({ filepath }, 'Restaurant info is not a JSON object; ignoring');
    } catch (err) {
      logger.error({ err, filepath }, 'Failed to load restaurant info');
    }
    return {};
  }
}

/** Lists of plain values read as a comma list; anything nested stays JSON. */
function renderInfoValue(value: unknown): string {
  if (Array.isArray(value) && value.every((item) => item === null || typeof item !== 'object')) {
    return value.join(', ');
  }
  if (value !== null && typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}
