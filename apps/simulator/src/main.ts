import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { SIMULATION_CONFIG } from "./config/simulation.config";
import type { SimulationConfig } from "./config/simulation.config";
import { reportFatal } from "./logger/fatal";
import { SimulationLogger } from "./logger/simulation-logger";
import { SimulationService } from "./services/simulation.service";

// console-only until the validated configuration names a log directory
let logger = new SimulationLogger();

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true, abortOnError: false });
  const config = app.get<SimulationConfig>(SIMULATION_CONFIG);
  logger = new SimulationLogger({ logDir: config.logDir, levels: config.logLevels });
  app.useLogger(logger);
  app.flushLogs();

  try {
    await app.get(SimulationService).run();
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  reportFatal(logger, error);
  process.exitCode = 1;
});

process.on("unhandledRejection", (reason) => {
  logger.error(`unhandledRejection ${String(reason)}`, undefined, "Process");
});

process.on("uncaughtException", (error) => {
  logger.error(`uncaughtException ${error.message}`, error.stack, "Process");
  process.exitCode = 1;
});
