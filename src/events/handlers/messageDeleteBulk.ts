import { createEvent } from "seyfert";
import { emitMessageDeleteBulk } from "@/events/hooks/messageDelete";

export default createEvent({
  data: { name: "messageDeleteBulk" },
  async run(payload, client, shardId) {
    await emitMessageDeleteBulk(payload, client, shardId);
  },
});
