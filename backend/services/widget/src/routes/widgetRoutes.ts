// backend/services/widget/src/routes/widgetRoutes.ts
import { Router } from "express";
import { routeTo } from "@render-with/shared";
import { WidgetsController } from "../controllers/WidgetsController";

const router = Router();

// one-liners only — no logic here

// Fixed paths before /:id
router.get("/catalog", routeTo(WidgetsController, "catalog"));
router.get("/search", routeTo(WidgetsController, "search"));
router.get("/stats", routeTo(WidgetsController, "stats"));
router.get("/mine", routeTo(WidgetsController, "mine"));
router.get("/export", routeTo(WidgetsController, "export"));
router.get("/print", routeTo(WidgetsController, "print"));
router.get("/browse", routeTo(WidgetsController, "browse"));
router.get("/featured", routeTo(WidgetsController, "featured"));
router.get("/popular", routeTo(WidgetsController, "popular"));
router.get("/grouped", routeTo(WidgetsController, "grouped"));

router.get("/", routeTo(WidgetsController, "index"));
router.post("/", routeTo(WidgetsController, "create"));
router.get("/:id", routeTo(WidgetsController, "show"));
router.patch("/:id", routeTo(WidgetsController, "update"));
router.delete("/:id", routeTo(WidgetsController, "destroy"));

router.get("/:id/lookup", routeTo(WidgetsController, "lookup"));
router.get("/:id/preview", routeTo(WidgetsController, "preview"));
router.post("/:id/archive", routeTo(WidgetsController, "archive"));
router.post("/:id/clone", routeTo(WidgetsController, "clone"));

export default router;
