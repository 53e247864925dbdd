// backend/services/widget/src/routes/adminWidgetRoutes.ts
import { Router } from "express";
import { routeTo } from "@render-with/shared";
import { WidgetsController } from "../controllers/WidgetsController";

const router = Router();

router.get("/", routeTo(WidgetsController, "adminIndex"));
router.post("/", routeTo(WidgetsController, "adminCreate"));
router.get("/:id", routeTo(WidgetsController, "adminShow"));
router.patch("/:id", routeTo(WidgetsController, "adminUpdate"));
router.delete("/:id", routeTo(WidgetsController, "adminDestroy"));

export default router;
