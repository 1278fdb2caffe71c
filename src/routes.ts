import express, { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { CampaignOrchestrator } from './orchestrator';
import { validatePlanRequest } from './agent/planner';
import { CampaignPipelineError } from './errors';
import { FREQUENCIES, Logger } from './models';

const planBody = z.object({
  name: z.string(),
  targetAudience: z.string(),
  goal: z.string(),
  platforms: z.array(z.string()).optional(),
  budget: z.string().default(''),
  durationDays: z.number().optional(),
  startDate: z.string().optional()
});

const scheduleBody = z.object({
  frequency: z.enum(FREQUENCIES).default('once')
});

const calendarQuery = z.object({
  start: z.string().optional(),
  days: z.coerce.number().int().positive().default(7)
});

type Handler = (req: Request, res: Response) => unknown;

// Express 4 does not catch rejected promises itself.
const wrap = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  Promise.resolve()
    .then(() => fn(req, res))
    .catch(next);
};


export function createRouter(orchestrator: CampaignOrchestrator) {
  const router = express.Router();

  router.get('/health', (req, res) => {
    res.send({ status: 'ok' });
  });

  // plan a campaign
  router.post('/campaigns', wrap(async (req, res) => {
    const parsed = planBody.safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).send({ error: 'invalid-body', detail: parsed.error.issues });
    const errors = validatePlanRequest(parsed.data);
    if (errors.length) return res.status(400).send({ error: 'invalid-plan', detail: errors });
    const plan = await orchestrator.planCampaign(parsed.data);
    res.status(201).send(plan);
  }));

  router.get('/campaigns', (req, res) => {
    res.send(orchestrator.listCampaigns());
  });

  // execute everything due in the next 7 days
  router.post('/campaigns/execute', (req, res) => {
    res.send(orchestrator.executeScheduledCampaigns());
  });

  router.get('/campaigns/:id', (req, res) => {
    const plan = orchestrator.getCampaign(req.params.id);
    if (!plan) return res.status(404).send({ error: 'campaign-not-found' });
    res.send(plan);
  });

  router.get('/campaigns/:id/status', (req, res) => {
    res.send(orchestrator.executor.getExecutionStatus(req.params.id));
  });

  router.post('/campaigns/:id/schedule', wrap((req, res) => {
    if (!orchestrator.getCampaign(req.params.id)) return res.status(404).send({ error: 'campaign-not-found' });
    const parsed = scheduleBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).send({ error: 'invalid-frequency', detail: `expected one of ${FREQUENCIES.join(', ')}` });
    }
    const events = orchestrator.scheduleCampaigns(req.params.id, parsed.data.frequency);
    res.status(201).send({ total: events.length, events });
  }));

  router.get('/calendar', wrap((req, res) => {
    const parsed = calendarQuery.safeParse(req.query);
    if (!parsed.success) return res.status(400).send({ error: 'invalid-query', detail: parsed.error.issues });
    res.send({ view: orchestrator.calendar.getCalendarView(parsed.data.start, parsed.data.days) });
  }));

  router.get('/calendar/summary', (req, res) => {
    res.send(orchestrator.calendar.getPlatformSummary());
  });

  router.get('/analytics', (req, res) => {
    res.send(orchestrator.trackPerformance());
  });

  router.get('/analytics/insights', wrap(async (req, res) => {
    res.send(await orchestrator.analyzer.analyzeCampaignPerformance(orchestrator.trackPerformance()));
  }));

  router.get('/report', (req, res) => {
    res.send({ report: orchestrator.generatePerformanceReport() });
  });

  router.post('/workflow', wrap(async (req, res) => {
    const parsed = planBody.safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).send({ error: 'invalid-body', detail: parsed.error.issues });
    const errors = validatePlanRequest(parsed.data);
    if (errors.length) return res.status(400).send({ error: 'invalid-plan', detail: errors });
    res.send(await orchestrator.runCompleteWorkflow(parsed.data));
  }));

  return router;
}


// body-parser and http-errors mark request faults with status/statusCode
function clientErrorStatus(err: unknown) {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function hasType(err: unknown, type: string) {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === type;
}


export function createApp(orchestrator: CampaignOrchestrator, logger: Logger = console) {
  const app = express();
  app.use(express.json());
  app.use('/api', createRouter(orchestrator));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof CampaignPipelineError) {
      return res.status(err.status).send({ error: err.code, detail: err.message });
    }
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      const code = hasType(err, 'entity.parse.failed') ? 'invalid-json' : 'bad-request';
      return res.status(status).send({ error: code, detail: err instanceof Error ? err.message : String(err) });
    }
    logger.error('request failed', err);
    res.status(500).send({ error: 'internal-error', detail: String(err) });
  });

  return app;
}
