import cors from "cors";
import express from "express";
import { loadConfig } from "./config";
import { createResolver } from "./resolver";
import createHealthRouter from "./routes/health";
import createDirectoryRouter from "./routes/directory";
import createPrayerTimesRouter from "./routes/prayer-times";

const config = loadConfig();
const { resolver, cache, close } = createResolver(config);

const app = express();

app.use(cors());

// Middleware to parse JSON bodies
app.use(express.json());

app.get("/", (req, res) => {
    res.send("Welcome to the Prayer Times API!");
});

app.use(createHealthRouter(config.baseUrl, cache));

app.use(createDirectoryRouter(resolver));

app.use(createPrayerTimesRouter(resolver));

const server = app.listen(config.port, () => {
    console.log(`[Server] Running at http://localhost:${config.port}`);
    console.log(`[Cache] Using ${config.cacheDir}`);
});

const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close(() => {
        close();
        process.exit(0);
    });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
