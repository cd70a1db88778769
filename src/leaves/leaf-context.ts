import type { RemoteEventQueue } from '@/interpreter/remote-event-queue';
import type { ActionTypeResolver } from '@/remote/action-type-resolver';
import type { RemoteClientFactory } from '@/remote/client-factory';

/** What remote leaves share with the session that created them */
export interface LeafContext {
    clients: RemoteClientFactory;
    actionTypes: ActionTypeResolver;
    events: RemoteEventQueue;
}
