import { requireTable, runTargetData } from "../src/lib/scores/requests";
import type { TargetDataResult } from "../src/types/scoreApi";
import { handleJsonRoute, type ApiRequest, type ApiResponse } from "./utils/http";
import { targetDataSchema, toRowFilters } from "./utils/schemas";
import { getSessionStore } from "./utils/session";
import type { SessionStore } from "./utils/sessionStore";

export const config = {
  runtime: "nodejs"
};

export const createTargetDataHandler =
  (store: SessionStore) => (req: ApiRequest, res: ApiResponse) =>
    handleJsonRoute(req, res, {
      route: "target-data",
      store,
      schema: targetDataSchema,
      run: ({ input, table }): TargetDataResult => {
        const shots = runTargetData(requireTable(table), {
          ...toRowFilters(input),
          startNr: input.start_nr
        });
        return {
          start_nr: input.start_nr,
          shots: shots.map((shot) => ({
            shot_num: shot.shotNum,
            x: shot.x,
            y: shot.y,
            decimal_score: shot.decimalScore
          }))
        };
      }
    });

export default function handler(req: ApiRequest, res: ApiResponse) {
  return createTargetDataHandler(getSessionStore())(req, res);
}
