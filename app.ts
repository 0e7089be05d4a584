import express from "express";

import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import countryRoute from "./routes/countries.routes";

export function createApp(): express.Express {
  const app = express();

  app.use(express.json());
  app.use("/", countryRoute);
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
