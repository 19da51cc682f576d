import { createEvent } from "seyfert";
import { emitMessageReactionAdd } from "@/events/hooks/messageReaction";

export default createEvent({
  data: { name: "messageReactionAdd" },
  async run(reaction, client, shardId) {
    await emitMessageReactionAdd(reaction, client, shardId);
  },
});
