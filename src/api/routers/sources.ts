// pattern: Imperative Shell
import { router, adminProcedure } from "../trpc";

export const sourcesRouter = router({
  list: adminProcedure.query(({ ctx }) => ctx.sources.list()),
});
