import { createEvent } from "seyfert";
import { emitMessageReactionRemove } from "@/events/hooks/messageReaction";

export default createEvent({
  data: { name: "messageReactionRemove" },
  async run(reaction, client, shardId) {
    await emitMessageReactionRemove(reaction, client, shardId);
  },
});
