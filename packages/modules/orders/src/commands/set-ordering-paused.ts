import { eq } from 'drizzle-orm';
import { publishWithEvents } from '@barflow/core/events/publish-with-events';
import { isBarAdminOf } from '@barflow/core/auth/actor';
import { logger } from '@barflow/core/observability/logger';
import { bars } from '@barflow/db';
import { AuthorizationError, NotFoundError } from '@barflow/shared';
import type { RequestContext } from '@barflow/core/auth/context';
import type { SetOrderingPausedInput } from '../validation';

export async function setOrderingPaused(
  ctx: RequestContext,
  barId: number,
  input: SetOrderingPausedInput,
): Promise<{ bar_id: number; ordering_paused: boolean }> {
  if (!isBarAdminOf(ctx.actor, barId)) {
    throw new AuthorizationError(`Only admins of bar ${barId} can pause ordering`);
  }

  const result = await publishWithEvents('setOrderingPaused', async (tx) => {
    const [bar] = await tx
      .update(bars)
      .set({ orderingPaused: input.paused })
      .where(eq(bars.id, barId))
      .returning({ id: bars.id, orderingPaused: bars.orderingPaused });
    if (!bar) throw new NotFoundError('Bar', barId);

    return { result: { bar_id: bar.id, ordering_paused: bar.orderingPaused }, events: [] };
  });

  logger.info(input.paused ? 'Ordering paused' : 'Ordering resumed', {
    requestId: ctx.requestId,
    userId: ctx.actor.userId,
    barId,
  });
  return result;
}
