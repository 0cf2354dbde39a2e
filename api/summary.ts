import { requireTable, runDeviceSummary } from "../src/lib/scores/requests";
import type { SummaryResult } from "../src/types/scoreApi";
import { handleJsonRoute, type ApiRequest, type ApiResponse } from "./utils/http";
import { rowFilterSchema, toRowFilters } from "./utils/schemas";
import { getSessionStore } from "./utils/session";
import type { SessionStore } from "./utils/sessionStore";

export const config = {
  runtime: "nodejs"
};

export const createSummaryHandler =
  (store: SessionStore) => (req: ApiRequest, res: ApiResponse) =>
    handleJsonRoute(req, res, {
      route: "summary",
      store,
      schema: rowFilterSchema,
      run: ({ input, table }): SummaryResult => {
        const summary = runDeviceSummary(requireTable(table), toRowFilters(input));
        return { summary: summary.rows, columns: summary.columns };
      }
    });

export default function handler(req: ApiRequest, res: ApiResponse) {
  return createSummaryHandler(getSessionStore())(req, res);
}
