// backend/services/widget/src/index.ts
import "./bootstrap";
import { getLogger } from "@render-with/shared";
import { createApp } from "./app";
import { loadWidgetConfig } from "./config";

const log = getLogger({ component: "widget.index" });
const cfg = loadWidgetConfig();

createApp({ defaultPerPage: cfg.defaultPerPage }).listen(cfg.port, () => {
  log.info(
    { event: "listening", port: cfg.port, service: cfg.serviceName },
    "widget service listening"
  );
});
