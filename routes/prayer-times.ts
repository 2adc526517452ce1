import { Router } from "express";
import { GeographicResolver } from "../resolver";
import { serializePrayerTimes } from "../utils";
import { sendError } from "./http-errors";

export default function createPrayerTimesRouter(resolver: GeographicResolver): Router {
    const router = Router();

    /**
     * POST /prayer-times
     * Body: { country, state, region }
     */
    router.post("/prayer-times", async (req, res) => {
        const { country, state, region } = (req.body ?? {}) as PrayerTimesRequestBody;

        console.log("REQUEST AT /prayer-times", { country, state, region }, new Date().toISOString());

        if (!country || !state || !region) {
            res.status(400).json({ error: "Missing country, state or region in request body." });
            return;
        }

        try {
            const result = await resolver.lookup(country, state, region);
            res.json({
                country: result.country.name,
                state: result.state.name,
                region: result.region.name,
                times: serializePrayerTimes(result.times),
            });
        } catch (error) {
            sendError(res, error, "Prayer-time lookup");
        }
    });

    return router;
}
