import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { ResolutionFacade } from "./facade";

const RegisterTaskSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional()
});

const BulkRegisterSchema = z.object({
  names: z.array(z.string().min(1)).min(1).max(100)
});

const DetectTasksSchema = z.object({
  text: z.string().min(1)
});

const CommandSchema = z.object({
  command: z.string().min(1)
});

function badRequest(res: Response, message: string): Response {
  return res.status(400).json({ message });
}

export function createRouter(facade: ResolutionFacade): Router {
  const router = Router();

  router.get("/tasks", (_req: Request, res: Response) => {
    res.json({ tasks: facade.knownTasks() });
  });

  router.get("/tasks/:name", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const answer = await facade.resolveTask(req.params.name);
      if ("status" in answer) {
        return badRequest(res, answer.reason);
      }
      return res.json(answer);
    } catch (error) {
      return next(error);
    }
  });

  router.post("/tasks", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = RegisterTaskSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return badRequest(res, "Request body must include a task name and an optional description string.");
    }
    try {
      const answer = await facade.registerTask(parsed.data.name, parsed.data.description);
      if ("status" in answer) {
        return badRequest(res, answer.reason);
      }
      return res.status(201).json(answer);
    } catch (error) {
      return next(error);
    }
  });

  router.post("/tasks/bulk", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = BulkRegisterSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return badRequest(res, "Request body must include a names array of 1 to 100 strings.");
    }
    try {
      return res.json({ registrations: await facade.bulkRegister(parsed.data.names) });
    } catch (error) {
      return next(error);
    }
  });

  router.post("/tasks/detect", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = DetectTasksSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return badRequest(res, "Request body must include a text string.");
    }
    try {
      return res.json(await facade.detectTasks(parsed.data.text));
    } catch (error) {
      return next(error);
    }
  });

  router.post("/commands/interpret", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = CommandSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return badRequest(res, "Request body must include a command string.");
    }
    try {
      const resolution = await facade.interpretCommand(parsed.data.command);
      if (resolution.status === "malformed") {
        return badRequest(res, resolution.reason);
      }
      return res.json(resolution);
    } catch (error) {
      return next(error);
    }
  });

  router.post("/commands/inspect", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = CommandSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return badRequest(res, "Request body must include a command string.");
    }
    try {
      const inspection = await facade.inspectCommand(parsed.data.command);
      if ("status" in inspection) {
        return badRequest(res, inspection.reason);
      }
      return res.json(inspection);
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
