import { Router } from "express";
import { getTaskById, queryTasks } from "../../../data/src/queries";
import { NotFoundError } from "../../../shared/errors";
import type { ApiResponse, ListResult, Task } from "../../../shared/types";
import type { AppContext } from "../app";
import { parseListParams } from "../params";

/** Read-only JSON view of the task list, taking the same query parameters as the listing page. */
export function taskRoutes({ db, now }: AppContext): Router {
  const router = Router();

  router.get("/", (req, res) => {
    const result = queryTasks(db, parseListParams(req.query), now());
    const body: ApiResponse<ListResult> = { data: result };
    res.json(body);
  });

  router.get("/:id(\\d+)", (req, res) => {
    const id = Number(req.params.id);
    const task = getTaskById(db, id);
    if (!task) {
      throw new NotFoundError(id);
    }
    const body: ApiResponse<Task> = { data: task };
    res.json(body);
  });

  return router;
}
