import { config } from './config/index.js';
import { createApp } from './app.js';
import { createStoryRepository } from './models/index.js';
import { createProviderRouter } from './services/ai/router.js';
import { StoryGenerator } from './services/ai/storyGeneration/index.js';
import { StoryService } from './services/story/storyService.js';
import logger from './utils/logger.js';

const generator = new StoryGenerator(createProviderRouter(config.ai), config.generation);
const service = new StoryService(createStoryRepository(config.storage), generator);

const app = createApp({
  service,
  clientUrl: config.clientUrl,
  nodeEnv: config.nodeEnv,
});

app.listen(config.port, () => {
  logger.info('SERVER', `Branching Stories API listening on port ${config.port} (${config.nodeEnv})`);
  console.log(`
╔═══════════════════════════════════════════════╗
║           Branching Stories API               ║
║═══════════════════════════════════════════════║
║  Status:  Running                             ║
║  Port:    ${String(config.port).padEnd(36)}║
║  Mode:    ${config.nodeEnv.padEnd(36)}║
╚═══════════════════════════════════════════════╝
  `);
});
