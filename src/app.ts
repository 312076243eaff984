import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createRoutes } from './routes';
import { AppServices } from './services';
import { swaggerSpec } from './swagger/swagger.config';
import { ALLOWED_ORIGINS } from './config/environment';
import { logger } from './config/logger';

const SWAGGER_UI_VERSION = '5.11.0';

const docsPage = `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Wash Bay Capacity API Docs</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@${SWAGGER_UI_VERSION}/swagger-ui.css">
  <style>
    body { margin: 0; padding: 0; }
    .swagger-ui .topbar { display: none; }
  </style>
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@${SWAGGER_UI_VERSION}/swagger-ui-bundle.js"></script>
  <script>
    window.onload = function() {
      SwaggerUIBundle({
        url: '/openapi.json',
        dom_id: '#swagger-ui',
        deepLinking: true,
        displayRequestDuration: true,
        tryItOutEnabled: true
      });
    };
  </script>
</body>
</html>`;

/**
 * Creates and configures the Express application over the given services
 */
export function createApp(services: AppServices): Application {
  const app = express();

  app.use(helmet({
    contentSecurityPolicy: false, // Swagger UI loads from a CDN
  }));

  app.use(cors({
    origin: ALLOWED_ORIGINS,
    credentials: true,
  }));

  app.use(express.json({ limit: '1mb' }));

  app.use(requestLogger);

  app.get('/docs', (_req, res) => {
    res.send(docsPage);
  });

  app.get('/openapi.json', (_req, res) => {
    res.json(swaggerSpec);
  });

  app.use('/', createRoutes(services));

  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  logger.debug('Express application configured');

  return app;
}
