export {
  convertNode,
  convertStorageOffline,
  convertStorageToMarkdown,
  draftMarkdown,
  type ConvertOptions,
  type HandledTag,
} from "./converter.js";
export {
  DEFAULT_CONVERTER_OPTIONS,
  type CalloutStyle,
  type ConverterOptions,
  type EmbedRequest,
  type MarkdownDraft,
} from "./conversion.js";
export { renderEmbed, resolveEmbeds, type EmbedCollaborators } from "./embeds.js";
export {
  enrichMentions,
  listMentionedUsers,
  userMention,
  UNKNOWN_USER_MENTION,
  type ResolveUserDisplayName,
} from "./mentions.js";
export { postprocessMarkdown, preprocessStorage } from "./preprocess.js";
export { parseStorageTree, type StorageElement, type StorageNode, type StorageText } from "./storage-tree.js";
export { ConfluenceClient, fromEnv, type ConfluenceClientOptions, type ConfluencePage, type ConfluenceUser } from "./api.js";
export { SlackClient, slackFromEnv } from "./slack.js";
export { loadSettings, type Settings } from "./config.js";
export {
  composeCanvasMarkdown,
  composeMarkdownFile,
  createAttachmentBridge,
  createMentionResolver,
  sanitizeFilename,
  type AttachmentHandle,
} from "./canvas.js";
