import { createApp } from './app';
import { config } from './config';

const app = createApp();

// Start server
const port = config.port;

app.listen(port, () => {
  console.info(`\n🎬 SRT Retimer ${config.version}`);
  console.info(`   Server running on http://localhost:${port}`);
  console.info(`   Environment: ${config.nodeEnv}`);
  console.info(`\n   API Endpoints:`);
  console.info(`   - GET  /api/health                - Check service status`);
  console.info(`   - POST /api/subtitles/merge       - Merge SRT files back to back`);
  console.info(`   - POST /api/subtitles/:operation  - shift, shiftby, stretch, squeeze,`);
  console.info(`                                       sync, reindex, shiftindex, replace`);
  console.info(`\n`);
});

export default app;
