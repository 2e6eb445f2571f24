export {
  EntryDiscoverer,
  createDiscoverer,
  classifySkip,
  DEFAULT_ENTRY_FILE_NAME,
  type DiscovererOptions
} from './discoverer.js'
