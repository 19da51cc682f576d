export const BINDING_MODES = ["normal", "unique", "exclusive"] as const;
export const ROLE_MESSAGE_STYLES = ["reaction", "button", "menu"] as const;
export const ROLE_MESSAGE_VERSION = 2;

export const DEFAULT_TITLE = "Reaction Roles";
export const DEFAULT_DESCRIPTION = "React to get roles";

/** Platform limits that bound a single message. */
export const LIMITS = {
  reactions: 20,
  buttons: 25,
  categories: 5,
  menuOptions: 25,
  categoryName: 40,
  label: 80,
  description: 100,
} as const;

/** Prefix of every component custom id owned by this module. */
export const COMPONENT_PREFIX = "rr";

export const ROLE_MESSAGES_COLLECTION = "reaction_role_messages";
export const LEGACY_COLLECTION = "reaction_roles";
