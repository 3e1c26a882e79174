import express from "express";
import { LoaderPlantContextResolver } from "../context/plantLocationContext";
import { env } from "../env";
import { plantQuery } from "../express";
import { createRecordLoader } from "../loaders";
import { logger } from "../util/logger";

async function main(): Promise<void> {
  const loader = createRecordLoader(env);
  const app = express();
  app.use(express.json());
  app.use(
    await plantQuery({
      loader,
      contextResolver: new LoaderPlantContextResolver(loader),
      apiKey: env.API_KEY,
      sortMode: env.SORT_MODE,
    }),
  );

  app.listen(env.PORT, () => {
    logger.info(
      { port: env.PORT, dataSource: env.DATA_SOURCE },
      `Plant query service listening on port ${env.PORT}`,
    );
  });
}

main().catch((error: unknown) => {
  logger.fatal({ error }, "Plant query service failed to start");
  process.exit(1);
});
