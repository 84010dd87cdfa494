import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import fenceRoutes from './routes/fence';
import materialRoutes from './routes/materials';
import { config } from './config';
import { checkDatabase, isDatabaseConfigured } from './services/database';

const app = express();

app.use(cors());
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: false }));

// Health check
app.get('/health', (req, res) => {
  res.json({
    status: 'ok',
    version: '1.0.0',
    service: 'farm-fence-calculator',
    database: isDatabaseConfigured() ? 'configured' : 'not configured',
    endpoints: {
      calculate: '/api/v1/fence/calculate',
      calculations: '/api/v1/fence/calculations',
      materials: '/api/v1/materials'
    }
  });
});

app.use('/api/v1/fence', fenceRoutes);
app.use('/api/v1/materials', materialRoutes);

// Malformed JSON bodies
app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ success: false, error: 'Invalid JSON format' });
    return;
  }
  next(err);
});

async function startServer(): Promise<void> {
  const status = await checkDatabase();
  const port = config.port;

  app.listen(port, () => {
    console.log(`🚀 Farm Fence Calculator API running on port ${port}`);
    console.log('');
    console.log('📊 Database Status:');
    const icon = !status.configured ? '⚠️ ' : status.connected ? '✅' : '❌';
    console.log(`   ${icon} ${status.message}`);
    console.log('');
    console.log('📌 API Endpoints:');
    console.log(`   Health:       http://localhost:${port}/health`);
    console.log(`   Calculate:    POST http://localhost:${port}/api/v1/fence/calculate`);
    console.log(`   History:      GET  http://localhost:${port}/api/v1/fence/calculations`);
    console.log(`   Fence Types:  GET  http://localhost:${port}/api/v1/fence/types`);
    console.log(`   Materials:    GET  http://localhost:${port}/api/v1/materials`);
    console.log(`   DB Status:    GET  http://localhost:${port}/api/v1/fence/db-status`);
  });
}

if (require.main === module) {
  startServer().catch(error => {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  });
}

export default app;
