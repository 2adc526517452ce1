import { Router } from "express";
import { GeographicResolver } from "../resolver";
import { sendError } from "./http-errors";

/**
 * GET /countries
 * GET /countries/:country/states
 * GET /countries/:country/states/:state/regions
 *
 * Names in the path are matched case-insensitively.
 */
export default function createDirectoryRouter(resolver: GeographicResolver): Router {
    const router = Router();

    router.get("/countries", async (req, res) => {
        try {
            const countries = await resolver.listCountries();
            res.json(countries.map(({ name, idx }) => ({ name, idx })));
        } catch (error) {
            sendError(res, error, "Listing countries");
        }
    });

    router.get("/countries/:country/states", async (req, res) => {
        try {
            const country = await resolver.findCountry(req.params.country);
            const states = await resolver.listStates(country);
            res.json(states.map(({ name, idx }) => ({ name, idx })));
        } catch (error) {
            sendError(res, error, "Listing states");
        }
    });

    router.get("/countries/:country/states/:state/regions", async (req, res) => {
        try {
            const country = await resolver.findCountry(req.params.country);
            const state = await resolver.findState(country, req.params.state);
            const regions = await resolver.listRegions(state);
            res.json(regions.map(({ name, idx, url }) => ({ name, idx, url })));
        } catch (error) {
            sendError(res, error, "Listing regions");
        }
    });

    return router;
}
