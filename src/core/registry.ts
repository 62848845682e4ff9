/**
 * Profile Registry
 *
 * Loads appliance profiles from a directory of JSON documents.
 * The active set is immutable: a reload builds a complete new set and swaps
 * it in, or keeps the previous one when any document is invalid.
 */
import fs from 'fs/promises'
import path from 'path'
import type { ApplianceProfile } from './types/profile'
import { parseProfileText } from './profileSchema'
import { SchemaInvalidError } from '../lib/errors'

// ============================================================================
// Registry Class
// ============================================================================

export class ProfileRegistry {
  private profiles: readonly ApplianceProfile[] = []
  private loaded = false

  constructor(private readonly directory: string) {}

  /**
   * Load all profiles. Throws SchemaInvalidError when any is invalid.
   */
  async loadAll(): Promise<readonly ApplianceProfile[]> {
    if (this.loaded) return this.profiles
    return this.reload()
  }

  /**
   * Re-read the directory and activate the new set atomically
   */
  async reload(): Promise<readonly ApplianceProfile[]> {
    const next = await loadProfileDirectory(this.directory)
    this.profiles = Object.freeze(next)
    this.loaded = true
    return this.profiles
  }

  /**
   * Get all active profiles
   */
  getAll(): readonly ApplianceProfile[] {
    return this.profiles
  }

  /**
   * Get a profile by appliance name
   */
  get(appliance: string): ApplianceProfile | undefined {
    return this.profiles.find(p => p.appliance === appliance)
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load every *.json profile of a directory, sorted by file name
 */
export async function loadProfileDirectory(directory: string): Promise<ApplianceProfile[]> {
  const entries = await fs.readdir(directory)
  const files = entries.filter(name => name.endsWith('.json')).sort()

  const profiles: ApplianceProfile[] = []
  for (const file of files) {
    const filePath = path.join(directory, file)
    const content = await fs.readFile(filePath, 'utf-8')
    profiles.push(parseProfileText(content, file))
  }

  const seen = new Set<string>()
  for (const profile of profiles) {
    if (seen.has(profile.appliance)) {
      throw new SchemaInvalidError(profile.origin, [`duplicate appliance name "${profile.appliance}"`])
    }
    seen.add(profile.appliance)
  }

  return profiles
}
