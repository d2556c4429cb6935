import type { ServiceConfig } from './config/serviceConfig';
import type { FileServer } from './files/fileServer';
import type { HashCache } from './hashing/hashCache';
import type { PathInfoCollector } from './pathsInfo/collector';

export type HubContext = {
  config: ServiceConfig;
  hashCache: HashCache;
  fileServer: FileServer;
  collector: PathInfoCollector;
};
