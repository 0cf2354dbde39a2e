import { requireTable, runShots } from "../src/lib/scores/requests";
import type { ShotRecord } from "../src/lib/scores/shots";
import type { ShotPayload, ShotsResult } from "../src/types/scoreApi";
import { handleJsonRoute, type ApiRequest, type ApiResponse } from "./utils/http";
import { shotsSchema } from "./utils/schemas";
import { getSessionStore } from "./utils/session";
import type { SessionStore } from "./utils/sessionStore";

export const config = {
  runtime: "nodejs"
};

const toShotPayload = (shot: ShotRecord): ShotPayload => ({
  index: shot.index,
  Time: shot.time,
  "Primary score": shot.primaryScore,
  "Secondary score": shot.secondaryScore,
  "Decimal score": shot.decimalScore,
  "Integer score": shot.integerScore
});

export const createShotsHandler =
  (store: SessionStore) => (req: ApiRequest, res: ApiResponse) =>
    handleJsonRoute(req, res, {
      route: "shots",
      store,
      schema: shotsSchema,
      run: ({ input, table }): ShotsResult => {
        const shots = runShots(requireTable(table), {
          relay: input.relay,
          startNrs: input.start_nrs,
          startNr: input.start_nr
        });
        return { shots: shots.map(toShotPayload) };
      }
    });

export default function handler(req: ApiRequest, res: ApiResponse) {
  return createShotsHandler(getSessionStore())(req, res);
}
