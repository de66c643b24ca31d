import express from "express";
import { createServer } from "http";
import { loadConfigFromEnv, RadarService, STREAM_IDS, type StreamId } from "../radar";

function isStreamId(value: string): value is StreamId {
  return STREAM_IDS.some((s) => s === value);
}

// Leading dot files (the staging directory) are never served
const staticOptions = { dotfiles: "ignore" as const, fallthrough: true };

async function startServer() {
  const config = loadConfigFromEnv();
  const service = await RadarService.create({ config });

  const app = express();
  const server = createServer(app);

  app.use("/output", express.static(config.streams.current.outputDir, staticOptions));
  app.use("/output_forecast", express.static(config.streams.forecast.outputDir, staticOptions));

  app.get("/api/latest/:stream", async (req, res) => {
    const stream = req.params.stream;
    if (!isStreamId(stream)) {
      res.status(404).json({ error: `Unknown stream: ${stream}` });
      return;
    }

    try {
      const artifacts = await service.latestArtifacts(stream);
      res.json({ stream, artifacts });
    } catch (error) {
      console.error("[server] Listing latest artifacts failed:", error);
      res.status(500).json({ error: "Failed to list artifacts" });
    }
  });

  const { host, port } = config.server;
  server.listen(port, host, () => {
    console.log(`[server] Serving radar output on http://${host}:${port}/`);
  });

  service.start();

  let stopping = false;
  const stop = async (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`[server] ${signal} received, shutting down`);
    server.close();
    const result = await service.shutdown(config.shutdownGraceMs);
    process.exit(result.completed ? 0 : 1);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    stop(signal).catch((error) => {
      console.error("[server] Shutdown failed:", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

startServer().catch((error) => {
  console.error("[server] Startup failed:", error);
  process.exit(1);
});
