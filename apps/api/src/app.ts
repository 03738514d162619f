import express from 'express';
import type { Express, Request, Response } from 'express';
import type { TaskStore } from '@taskdeck/domain';
import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import { CreateTaskPipeline } from './create-task-pipeline.js';
import { UpdateTaskPipeline } from './update-task-pipeline.js';
import { DeleteTaskPipeline } from './delete-task-pipeline.js';
import { QueryService, mapToTaskView } from './query-service.js';
import { HealthService } from './health.js';
import { loadLandingTemplate, renderLandingPage } from './landing-page.js';
import { corsMiddleware } from './middleware/cors.js';
import { requestLogger } from './middleware/request-logger.js';
import { rateLimit } from './middleware/rate-limit.js';
import type { RateLimiter } from './middleware/rate-limit.js';
import { errorHandler, notFoundHandler } from './http/error-handler.js';
import { sendCreated, sendJson, sendNoContent, sendSuccess } from './http/response.js';
import {
    parseCreateTaskBody,
    parseListQuery,
    parseSearchBody,
    parseTaskId,
    parseUpdateTaskBody,
} from './task-schemas.js';

export const API_PREFIX = '/api/v1';

export interface AppDependencies {
    config: AppConfig;
    store: TaskStore;
    logger: Logger;
    rateLimiter: RateLimiter;
    landingTemplate?: string;
}

export function createApp({ config, store, logger, rateLimiter, landingTemplate }: AppDependencies): Express {
    const app = express();
    const httpLogger = logger.child({ component: 'http' });

    const queryService = new QueryService(store);
    const health = new HealthService(store, config.app.version);

    // Pipelines
    const createPipeline = new CreateTaskPipeline(store, logger.child({ component: 'commands' }));
    const updatePipeline = new UpdateTaskPipeline(store, logger.child({ component: 'commands' }));
    const deletePipeline = new DeleteTaskPipeline(store, logger.child({ component: 'commands' }));

    if (config.features.enableCors) app.use(corsMiddleware());
    if (config.features.enableLogging) app.use(requestLogger(httpLogger));
    app.use(rateLimit(rateLimiter, httpLogger));
    app.use(express.json());

    const landingPage = renderLandingPage(landingTemplate ?? loadLandingTemplate(), config.app);
    app.get('/', (_req: Request, res: Response) => {
        res.type('html').send(landingPage);
    });

    const api = express.Router();

    api.get('/health', (_req: Request, res: Response) => {
        sendSuccess(res, health.health());
    });

    api.get('/ready', async (_req: Request, res: Response) => {
        const report = await health.readiness();
        const ready = report.status === 'ready';
        sendJson(res, ready ? 200 : 503, { success: ready, data: report, timestamp: new Date().toISOString() });
    });

    api.get('/live', (_req: Request, res: Response) => {
        sendSuccess(res, health.liveness());
    });

    api.get('/tasks', async (req: Request, res: Response) => {
        sendSuccess(res, await queryService.getTasks(parseListQuery(req.query)));
    });

    api.post('/tasks', async (req: Request, res: Response) => {
        const task = await createPipeline.execute({ type: 'TASK_CREATE', payload: parseCreateTaskBody(req.body) });
        sendCreated(res, mapToTaskView(task));
    });

    // Registered before /tasks/:id so the literal paths win.
    api.get('/tasks/stats', async (_req: Request, res: Response) => {
        sendSuccess(res, await queryService.getStats());
    });

    api.post('/tasks/search', async (req: Request, res: Response) => {
        sendSuccess(res, await queryService.searchTasks(parseSearchBody(req.body)));
    });

    api.get('/tasks/:id', async (req: Request, res: Response) => {
        sendSuccess(res, await queryService.getTask(parseTaskId(req.params.id)));
    });

    api.put('/tasks/:id', async (req: Request, res: Response) => {
        const taskId = parseTaskId(req.params.id);
        const task = await updatePipeline.execute({
            type: 'TASK_UPDATE',
            payload: { taskId, changes: parseUpdateTaskBody(req.body) },
        });
        sendSuccess(res, mapToTaskView(task));
    });

    api.delete('/tasks/:id', async (req: Request, res: Response) => {
        const taskId = parseTaskId(req.params.id);
        await deletePipeline.execute({ type: 'TASK_DELETE', payload: { taskId } });
        sendNoContent(res);
    });

    app.use(API_PREFIX, api);
    app.use(notFoundHandler);
    app.use(errorHandler(logger.child({ component: 'errors' })));

    return app;
}
