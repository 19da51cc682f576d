import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "reactionroles",
  description: "Configure self-assignable role messages",
  defaultMemberPermissions: ["ManageRoles"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
  botPermissions: ["ManageRoles"],
})
@AutoLoad()
export default class ReactionRolesParentCommand extends Command {}
