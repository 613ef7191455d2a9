/**
 * Scripted in-memory BrowserSession for feed and search tests
 */

import type { BrowserSession } from '../core/types.js';
import { DEFAULT_LOCATORS, LocatorTable } from '../feed/locators.js';

export type FakeHandle =
  | { kind: 'thumb'; index: number }
  | { kind: 'more' }
  | { kind: 'input' }
  | { kind: 'trigger' }
  | { kind: 'tab' };

export interface FakeProgress {
  scrolls: number;
  clicks: number;
}

export interface FakeScript {
  /** Thumbnails present after the given scrolls and load-more clicks */
  itemCount?: (progress: FakeProgress) => number;
  /** Attributes of thumbnail i */
  attributes?: (index: number) => Record<string, string>;
  /** Scroll offset after n scrolls */
  position?: (scrolls: number) => number;
  loadMoreShown?: (progress: FakeProgress) => boolean;
  /** Upload input present from the start, or only after the trigger is clicked */
  uploadInput?: 'present' | 'behind-trigger' | 'absent';
  resultsTab?: boolean;
  /** Errors thrown by successive navigate calls; later calls succeed */
  navigateErrors?: Error[];
  failingLocators?: string[];
  failingClicks?: FakeHandle['kind'][];
  /** Error thrown by uploadFile */
  uploadError?: Error;
  /** @default 'https://search.example.test/images/search' */
  pageUrl?: string;
}

export const FAKE_LOCATORS: LocatorTable = {
  ...DEFAULT_LOCATORS,
  uploadInput: ['.upload'],
  uploadTrigger: ['.camera'],
  resultsTab: ['.tab'],
  loadMore: ['.more'],
  thumbnail: ['.thumb'],
  mediaAttributes: ['href', 'src'],
};

export function defaultThumbnailUrl(index: number): string {
  return `https://img.example.test/${index}.jpg`;
}

export class FakeSession implements BrowserSession<FakeHandle> {
  scrolls = 0;
  loadMoreClicks = 0;
  triggerClicks = 0;
  tabClicks = 0;
  closeCalls = 0;
  navigations: string[] = [];
  uploads: string[] = [];

  private readonly script: FakeScript;
  private readonly navigateErrors: Error[];

  constructor(script: FakeScript = {}) {
    this.script = script;
    this.navigateErrors = [...(script.navigateErrors ?? [])];
  }

  private get progress(): FakeProgress {
    return { scrolls: this.scrolls, clicks: this.loadMoreClicks };
  }

  async navigate(url: string): Promise<void> {
    this.navigations.push(url);
    const error = this.navigateErrors.shift();
    if (error) {
      throw error;
    }
  }

  async uploadFile(input: FakeHandle, filePath: string): Promise<void> {
    if (input.kind !== 'input') {
      throw new Error(`Cannot upload into ${input.kind}`);
    }
    if (this.script.uploadError) {
      throw this.script.uploadError;
    }
    this.uploads.push(filePath);
  }

  async findElements(locator: string): Promise<FakeHandle[]> {
    if (this.script.failingLocators?.includes(locator)) {
      throw new Error(`Malformed locator: ${locator}`);
    }

    switch (locator) {
      case '.thumb': {
        const count = this.script.itemCount?.(this.progress) ?? 0;
        return Array.from({ length: count }, (_, index): FakeHandle => ({ kind: 'thumb', index }));
      }
      case '.more':
        return this.script.loadMoreShown?.(this.progress) ? [{ kind: 'more' }] : [];
      case '.upload': {
        const mode = this.script.uploadInput ?? 'present';
        const shown = mode === 'present' || (mode === 'behind-trigger' && this.triggerClicks > 0);
        return shown ? [{ kind: 'input' }] : [];
      }
      case '.camera':
        return this.script.uploadInput === 'behind-trigger' ? [{ kind: 'trigger' }] : [];
      case '.tab':
        return this.script.resultsTab ? [{ kind: 'tab' }] : [];
      default:
        return [];
    }
  }

  async isVisible(_handle: FakeHandle): Promise<boolean> {
    return true;
  }

  async readAttribute(handle: FakeHandle, name: string): Promise<string | null> {
    if (handle.kind !== 'thumb') {
      return null;
    }
    const attributes: Record<string, string> = this.script.attributes?.(handle.index) ?? { src: defaultThumbnailUrl(handle.index) };
    return attributes[name] ?? null;
  }

  async click(handle: FakeHandle): Promise<void> {
    if (this.script.failingClicks?.includes(handle.kind)) {
      throw new Error(`Element not clickable: ${handle.kind}`);
    }
    switch (handle.kind) {
      case 'more':
        this.loadMoreClicks++;
        break;
      case 'trigger':
        this.triggerClicks++;
        break;
      case 'tab':
        this.tabClicks++;
        break;
      default:
        break;
    }
  }

  async scrollToBottom(): Promise<void> {
    this.scrolls++;
  }

  async currentScrollPosition(): Promise<number> {
    return this.script.position?.(this.scrolls) ?? this.scrolls * 100;
  }

  async currentUrl(): Promise<string> {
    return this.script.pageUrl ?? 'https://search.example.test/images/search';
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }
}
