/**
 * Persistence for raw → canonical category mappings.
 *
 * The file store keeps the whole list as a JSON array of
 * { oldCategory, newCategory } and rewrites it on every append, so a
 * resolution survives a crash right after it was made.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { CategoryMapping } from '../types/Product.js';
import { ConfigurationError, describeError } from '../utils/errors.js';

export interface MappingStore {
  readonly location: string;
  load(): CategoryMapping[];
  append(mapping: CategoryMapping): void;
  save(mappings: CategoryMapping[]): void;
}

const MappingFileSchema = z.array(
  z.object({
    oldCategory: z.string(),
    newCategory: z.string(),
  })
);

export class JsonFileMappingStore implements MappingStore {
  private entries: CategoryMapping[] | null = null;

  constructor(readonly location: string) {}

  load(): CategoryMapping[] {
    if (!fs.existsSync(this.location)) {
      console.warn(`⚠️  [mappingStore] ${this.location} not found - starting with no mappings`);
      this.entries = [];
      return [];
    }

    let parsed: unknown;
    try {
      let content = fs.readFileSync(this.location, 'utf-8');
      if (content.charCodeAt(0) === 0xFEFF) content = content.slice(1);
      parsed = content.trim() === '' ? [] : JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Category mapping store ${this.location} is unreadable: ${describeError(error)}`,
        this.location
      );
    }

    const result = MappingFileSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ConfigurationError(
        `Category mapping store ${this.location} is corrupt at [${issue?.path.join('.') ?? ''}]: ${issue?.message ?? 'invalid'}`,
        this.location
      );
    }

    this.entries = result.data;
    return [...result.data];
  }

  append(mapping: CategoryMapping): void {
    const entries = this.entries ?? this.load();
    entries.push({ ...mapping });
    this.entries = entries;
    this.write(entries);
  }

  save(mappings: CategoryMapping[]): void {
    this.entries = mappings.map(mapping => ({ ...mapping }));
    this.write(this.entries);
  }

  private write(entries: CategoryMapping[]): void {
    fs.mkdirSync(path.dirname(this.location), { recursive: true });
    fs.writeFileSync(this.location, JSON.stringify(entries, null, 2) + '\n', 'utf-8');
  }
}

export class MemoryMappingStore implements MappingStore {
  readonly location = 'memory';
  private entries: CategoryMapping[];

  constructor(initial: CategoryMapping[] = []) {
    this.entries = initial.map(mapping => ({ ...mapping }));
  }

  load(): CategoryMapping[] {
    return this.entries.map(mapping => ({ ...mapping }));
  }

  append(mapping: CategoryMapping): void {
    this.entries.push({ ...mapping });
  }

  save(mappings: CategoryMapping[]): void {
    this.entries = mappings.map(mapping => ({ ...mapping }));
  }
}
