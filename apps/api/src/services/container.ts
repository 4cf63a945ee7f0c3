import type { ClassificationGateway } from './classification.js'
import { createComplaintEventBus, type ComplaintEventBus } from './complaint-events.js'
import { ComplaintIntake } from './complaint-intake.js'
import type { ComplaintStore } from './complaint-store.js'
import { BroadcastRegistry, bridgeComplaintEvents } from './realtime-registry.js'
import { StatusWorkflow } from './status-workflow.js'
import { VoteLedger } from './vote-ledger.js'

export type ApiServices = {
  store: ComplaintStore
  events: ComplaintEventBus
  intake: ComplaintIntake
  ledger: VoteLedger
  workflow: StatusWorkflow
  registry: BroadcastRegistry
  /** Detaches the registry from the event bus. */
  dispose: () => void
}

/** Wires the services around one store and classifier. */
export function createServices(deps: {
  store: ComplaintStore
  classifier: ClassificationGateway
  emailDomain: string
  /** Bound on one realtime send or probe. */
  sendTimeoutMs?: number
}): ApiServices {
  const events = createComplaintEventBus()
  const registry = new BroadcastRegistry(undefined, deps.sendTimeoutMs)
  const detach = bridgeComplaintEvents(events, registry)

  return {
    store: deps.store,
    events,
    registry,
    intake: new ComplaintIntake({
      store: deps.store,
      classifier: deps.classifier,
      emailDomain: deps.emailDomain,
    }),
    ledger: new VoteLedger({ store: deps.store, events, emailDomain: deps.emailDomain }),
    workflow: new StatusWorkflow({ store: deps.store, events }),
    dispose: detach,
  }
}
