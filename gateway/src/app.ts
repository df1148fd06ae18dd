import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import cors from "@fastify/cors";
import { z, ZodError } from "zod";
import {
  VERSION,
  stepTimeoutSchema,
  parsePlan,
  silentLogger,
  type Logger,
  type Orchestrator,
  type PlanIssue,
  type RunReport,
} from "../../runtime/src/index.js";
import { TaskTracker } from "./task-tracker.js";

const taskRequestSchema = z.object({
  goal: z.string(),
  verbose: z.boolean().default(false),
  async: z.boolean().default(false),
});

const planRequestSchema = z.object({
  goal: z.string(),
});

const toolRequestSchema = z
  .object({
    args: z.record(z.unknown()).default({}),
    timeoutSeconds: stepTimeoutSchema.optional(),
  })
  .default({});

const eventsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export interface GatewayOptions {
  /** Fastify request logging. */
  requestLogging?: boolean;
  logger?: Logger;
  now?: () => Date;
  /** Finished async tasks kept for `GET /tasks/:taskId`. */
  maxFinishedTasks?: number;
}

export interface Gateway {
  app: FastifyInstance;
  tasks: TaskTracker;
}

/**
 * HTTP surface over one orchestrator. Routes are thin: parse, call, shape.
 */
export async function buildGateway(
  orchestrator: Orchestrator,
  options: GatewayOptions = {},
): Promise<Gateway> {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const tasks = new TaskTracker(logger, now, options.maxFinishedTasks);

  const app = Fastify({
    logger: options.requestLogging ?? false,
  });

  await app.register(cors);

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof ZodError) {
      return sendInvalid(reply, error);
    }
    logger.error("Request failed", { error: error.message });
    return reply.code(error.statusCode ?? 500).send({ error: error.message });
  });

  const health = async () => {
    const services = await orchestrator.checkHealth();
    return {
      status: "healthy",
      timestamp: now().toISOString(),
      version: VERSION,
      services,
    };
  };
  app.get("/", health);
  app.get("/health", health);

  app.post("/execute", async (request, reply) => {
    const body = taskRequestSchema.parse(request.body);

    if (body.async) {
      const task = tasks.start(body.goal, () => orchestrator.execute(body.goal));
      return reply.code(202).send({
        status: "accepted",
        taskId: task.taskId,
        goal: body.goal,
        message: `Task '${body.goal}' accepted for async execution`,
      });
    }

    const started = now().getTime();
    const { plan, report } = await orchestrator.execute(body.goal);
    const durationSeconds = (now().getTime() - started) / 1000;

    if (report.status === "failed-to-start") {
      return reply.code(422).send({
        status: report.status,
        goal: body.goal,
        message: "Plan rejected before execution",
        issues: describeIssues(report.issues),
        durationSeconds,
      });
    }

    return {
      status: "success",
      goal: body.goal,
      message: `Successfully executed ${report.outcomes.length} steps`,
      ...(body.verbose ? { plan, results: report.outcomes } : {}),
      durationSeconds,
    };
  });

  app.post("/plan", async (request) => {
    const body = planRequestSchema.parse(request.body);
    const plan = orchestrator.plan(body.goal);
    return {
      status: "success",
      goal: body.goal,
      plan,
      stepsCount: plan.steps.length,
      message: "Plan created successfully",
    };
  });

  app.post("/plans/run", async (request, reply) => {
    const plan = parsePlan(request.body, now);
    const report = await orchestrator.run(plan);
    if (report.status === "failed-to-start") {
      return reply.code(422).send(describeReport(report));
    }
    return describeReport(report);
  });

  app.get("/tools", async () => ({ tools: orchestrator.listTools() }));

  app.post<{ Params: { name: string } }>("/tools/:name", async (request, reply) => {
    const { name } = request.params;
    if (!orchestrator.hasTool(name)) {
      return reply.code(404).send({ error: `Unknown tool: ${name}` });
    }
    const body = toolRequestSchema.parse(request.body);
    return await orchestrator.executeTool(name, body.args, {
      timeoutSeconds: body.timeoutSeconds,
    });
  });

  app.get("/status", async () => ({
    status: "operational",
    executionSummary: orchestrator.summarize(),
    timestamp: now().toISOString(),
  }));

  app.get("/events", async (request) => {
    const query = eventsQuerySchema.parse(request.query);
    return { events: await orchestrator.recentEvents(query.limit) };
  });

  app.get<{ Params: { taskId: string } }>("/tasks/:taskId", async (request, reply) => {
    const task = tasks.get(request.params.taskId);
    if (!task) {
      return reply.code(404).send({ error: `Unknown task: ${request.params.taskId}` });
    }
    return task;
  });

  return { app, tasks };
}

function sendInvalid(reply: FastifyReply, error: ZodError): FastifyReply {
  return reply.code(400).send({
    error: "Invalid request",
    issues: error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  });
}

function describeIssues(issues: PlanIssue[]): Array<{ kind: string; stepIndex: number; message: string }> {
  return issues.map((issue) => ({
    kind: issue.kind,
    stepIndex: issue.stepIndex,
    message: issue.error.message,
  }));
}

function describeReport(report: RunReport): Record<string, unknown> {
  if (report.status === "failed-to-start") {
    return {
      status: report.status,
      goal: report.goal,
      issues: describeIssues(report.issues),
      outcomes: [],
    };
  }
  return { ...report };
}
