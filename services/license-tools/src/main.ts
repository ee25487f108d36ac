import "reflect-metadata";

import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import morgan from "morgan";

import { AppModule } from "./app.module.js";
import type { AppConfig } from "./config.js";
import { APP_CONFIG } from "./tokens.js";

export async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.use(morgan("tiny"));

  const config = app.get<AppConfig>(APP_CONFIG);
  await app.listen(config.port);
  new Logger("Bootstrap").log(`License tools listening on port ${config.port}`);
  return app;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  bootstrap().catch((error) => {
    // eslint-disable-next-line no-console
    console.error("Failed to bootstrap license tools", error);
    process.exitCode = 1;
  });
}
