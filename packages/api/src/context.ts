import type { Config, Logger } from '@quill/shared';
import { ViralityService } from '@quill/virality';
import { ContentService, createContentGenerator } from '@quill/generator';

export interface Services {
  virality: ViralityService;
  content: ContentService;
}

export function createServices(config: Config, logger: Logger): Services {
  const generator = createContentGenerator(config, logger);
  logger.info({ generator: generator.name }, 'Content generator selected');
  return {
    virality: new ViralityService(logger.child({ module: 'virality' })),
    content: new ContentService(generator, logger.child({ module: 'content' })),
  };
}
