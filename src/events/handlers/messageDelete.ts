import { createEvent } from "seyfert";
import { emitMessageDelete } from "@/events/hooks/messageDelete";

export default createEvent({
  data: { name: "messageDelete" },
  async run(message, client, shardId) {
    await emitMessageDelete(message, client, shardId);
  },
});
