import {
  DEFAULT_FETCH_DIR,
  SourceDescriptor,
  parseSourcesConfig,
} from '../models/SourceDescriptor';

export class SourceDescriptorStore {
  private descriptors: SourceDescriptor[] = [];
  private byName = new Map<string, SourceDescriptor>();
  private fetchDirectory: string = DEFAULT_FETCH_DIR;

  static fromText(configText: string): SourceDescriptorStore {
    const store = new SourceDescriptorStore();
    store.load(configText);
    return store;
  }

  /**
   * Parses a sources document and replaces the current descriptors.
   * Throws ConfigError without touching the current state.
   */
  load(configText: string): SourceDescriptor[] {
    const config = parseSourcesConfig(configText);

    this.descriptors = config.sources;
    this.byName = new Map(config.sources.map((source) => [source.name, source]));
    this.fetchDirectory = config.fetchdir;
    return this.list();
  }

  list(): SourceDescriptor[] {
    return [...this.descriptors];
  }

  get(name: string): SourceDescriptor | undefined {
    return this.byName.get(name);
  }

  get fetchDir(): string {
    return this.fetchDirectory;
  }
}
