import { vi } from "vitest"
import { describeMailTransportContract } from "../../../ports/__tests__/transport.contract"
import { type SesClient, SesMailTransport } from "../ses-transport"

describeMailTransportContract({
  name: "SesMailTransport",
  async make() {
    const send = vi.fn<SesClient["send"]>().mockResolvedValue({
      MessageId: "ses-contract-id",
      $metadata: {},
    })

    return { transport: new SesMailTransport({ client: { send } }) }
  },
})
