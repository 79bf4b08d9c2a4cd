import { Router } from "express";
import { getCategories, insertTask, queryTasks, removeTask, toggleTask, updateTask } from "../../../data/src/queries";
import { formatDate } from "../../../data/src/dates";
import { NotFoundError } from "../../../shared/errors";
import { renderIndexPage } from "../../../frontend/src/render";
import type { AppContext } from "../app";
import { parseListParams, parseTaskForm } from "../params";

/**
 * Server-rendered listing page and the form/link endpoints that mutate tasks.
 * Every mutation redirects back to the listing.
 */
export function pageRoutes({ db, log, now }: AppContext): Router {
  const router = Router();

  // A task that vanished between render and click is not worth an error page.
  const tolerateMissing = (action: string, fn: () => void) => {
    try {
      fn();
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      log.warn(`${action} skipped: ${err.message}`);
    }
  };

  router.get("/", (req, res) => {
    const params = parseListParams(req.query);
    const current = now();
    const result = queryTasks(db, params, current);
    const html = renderIndexPage({
      params,
      result,
      categories: getCategories(db),
      today: formatDate(current),
    });
    res.type("html").send(html);
  });

  router.post("/add", (req, res) => {
    const task = insertTask(db, parseTaskForm(req.body), now());
    log.debug(`Created task ${task.id}`);
    res.redirect("/");
  });

  router.get("/toggle/:id(\\d+)", (req, res) => {
    tolerateMissing("toggle", () => toggleTask(db, Number(req.params.id), now()));
    res.redirect("/");
  });

  router.post("/edit/:id(\\d+)", (req, res) => {
    const input = parseTaskForm(req.body);
    tolerateMissing("edit", () => updateTask(db, Number(req.params.id), input, now()));
    res.redirect("/");
  });

  router.get("/delete/:id(\\d+)", (req, res) => {
    tolerateMissing("delete", () => removeTask(db, Number(req.params.id)));
    res.redirect("/");
  });

  return router;
}
