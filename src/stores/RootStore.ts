import { IngestStore } from './IngestStore'
import { SettingsStore, type ReaderSettingsInput } from './SettingsStore'

/**
 * Root store combining all stores
 */
export class RootStore {
  settingsStore: SettingsStore
  ingestStore: IngestStore

  constructor(settings: ReaderSettingsInput = {}) {
    this.settingsStore = new SettingsStore(settings)
    this.ingestStore = new IngestStore(this.settingsStore)
  }

  /**
   * Reset all stores
   */
  reset(): void {
    this.ingestStore.reset()
    this.settingsStore.reset()
  }
}
