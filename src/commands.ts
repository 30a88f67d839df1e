import Ask from "./commands/ask.js";
import Chat from "./commands/chat.js";
import Extend from "./commands/extend.js";
import Files from "./commands/files.js";
import Index from "./commands/index-path.js";
import List from "./commands/list.js";

export const COMMANDS = {
  index: Index,
  extend: Extend,
  ask: Ask,
  chat: Chat,
  list: List,
  files: Files,
};
