import express, { Application } from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import healthCheckRouter from './routes/healthCheck';
import nodeTypesRouter from './routes/nodeTypes';
import sampleRouter from './routes/sample';
import { getConfig } from './config';
import { validateApiKey } from './middleware/auth';

dotenv.config();

const config = getConfig();

console.log('=== Noise Composer Configuration ===');
console.log(`Port: ${config.derived.port}`);
console.log(`Sampling: up to ${config.sampling.maxPointsPerRequest.toLocaleString()} points, graph depth ${config.sampling.maxGraphDepth}`);
console.log(`Default Seed: ${config.noise.defaultSeed}`);
console.log(`Log Level: ${config.runtime.logLevel}`);
console.log('====================================\n');

const app: Application = express();
const PORT = config.derived.port;

app.use(cors());
app.use(express.json({ limit: config.server.jsonBodyLimit }));
app.use(express.urlencoded({ extended: true }));

app.use('/api/health-check', healthCheckRouter);

app.use(validateApiKey);

// All routes after this point require API key authentication
app.use('/api/node-types', nodeTypesRouter);
app.use('/api/sample', sampleRouter);

app.listen(PORT, () => {
  console.log(`[Server] Running on port ${PORT}`);
  console.log(`[Server] Health check available at http://localhost:${PORT}/api/health-check`);
});
