import express, { Express } from "express";
import bodyParser from "body-parser";
import { AppServices } from "./container";
import adminRouter from "./routes/admin";
import catalogRouter from "./routes/catalog";
import depositsRouter from "./routes/deposits";
import healthRouter from "./routes/health";
import { errorHandler, requestLogger } from "./routes/middleware";
import userRouter from "./routes/user";

export function createApp(services: AppServices): Express {
  const app = express();

  app.use(requestLogger(services.logger.child({ module: "http" })));
  app.use(bodyParser.json());

  app.use('/', healthRouter(services));
  app.use('/', catalogRouter(services));
  app.use('/', depositsRouter(services));
  app.use('/', userRouter(services));
  app.use('/', adminRouter(services));

  app.use(errorHandler(services.logger));

  return app;
}
