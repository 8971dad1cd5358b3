import { describeMailTransportContract } from "../../../ports/__tests__/transport.contract"
import { createSmtpTestClient } from "../../../tests/utils/create-smtp-test-client"
import { SmtpMailTransport } from "../smtp-transport"

describeMailTransportContract({
  name: "SmtpMailTransport",
  async make() {
    const client = createSmtpTestClient()

    return {
      transport: new SmtpMailTransport({ client }),
      close: async () => client.close(),
    }
  },
})
