import express from "express";
import { getErrorMessage, loadServerConfig } from "./mbx-to-mbox.js";
import { convertUpload, parseTargetHint } from "./upload.js";

const config = loadServerConfig();
const app = express();

// Parse raw binary data for archive uploads
app.use("/api/convert", express.raw({ type: "*/*", limit: config.maxUpload }));

app.get("/api/health", (_req, res) => {
  res.json({ status: "ok" });
});

// Convert one uploaded archive
app.post("/api/convert", (req, res) => {
  const startTime = Date.now();
  const body: unknown = req.body;
  if (!Buffer.isBuffer(body) || body.length === 0) {
    console.warn(`[convert] Bad request: empty body`);
    res.status(400).json({ error: "No file provided" });
    return;
  }

  const target = parseTargetHint(req.query.target, config.target);
  if (target === undefined) {
    console.warn(`[convert] Bad request: invalid target`);
    res.status(400).json({ error: "Invalid target" });
    return;
  }
  console.log(`[convert] Received ${(body.length / 1024).toFixed(1)} KB`);

  try {
    const { mbox, result } = convertUpload(body, { ...config, target });
    const elapsed = Date.now() - startTime;
    console.log(`[convert] ${result.messages} message(s) in ${elapsed}ms (output ${(mbox.length / 1024).toFixed(1)} KB)`);

    res.setHeader("Content-Type", "application/mbox");
    res.setHeader("Content-Disposition", 'attachment; filename="converted.mbox"');
    res.setHeader("X-Messages-Converted", String(result.messages));
    res.setHeader("X-Attachments-Found", String(result.attachments.found));
    res.setHeader("X-Attachments-Missing", String(result.attachments.missing));
    res.send(mbox);
  } catch (error) {
    const elapsed = Date.now() - startTime;
    console.error(`[convert] Failed after ${elapsed}ms:`, error instanceof Error ? error.stack : error);
    res.status(500).json({
      error: "Failed to convert archive",
      details: getErrorMessage(error),
    });
  }
});

app.listen(config.port, () => {
  console.log(`Server running at http://localhost:${config.port}`);
});
