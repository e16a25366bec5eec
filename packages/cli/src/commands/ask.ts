import { Command } from 'commander';
import { Conversation, ConversationStore, SemanticValue } from '@semantix/core';
import { SemantixError } from '@semantix/shared';
import { withSession } from '../setup.js';
import { formatConversationList } from '../output/formatter.js';

export const askCommand = new Command('ask')
  .description('Ask a question about a value, or continue a saved conversation')
  .argument('[value]', 'Text the question is about')
  .argument('[question]', 'The question')
  .option('--conversation <id>', 'Continue (or start) a saved conversation; the first argument is the message')
  .option('--list', 'List saved conversations')
  .option('-c, --config <path>', 'Config file to read instead of searching')
  .action(async (
    value: string | undefined,
    question: string | undefined,
    options: { conversation?: string; list?: boolean; config?: string },
  ) => {
    await withSession({ configPath: options.config }, async ({ config, runtime, store }) => {
      const conversations = new ConversationStore(config.store.sessionsDir, store?.conversations);

      if (options.list) {
        console.log(formatConversationList(await conversations.list()));
        return;
      }

      if (options.conversation) {
        if (!value) throw new SemantixError('A message is required with --conversation');
        const conversation = await conversations.load(options.conversation, { runtime })
          ?? new Conversation({ runtime, id: options.conversation });
        const reply = await conversation.forward(value);
        await conversations.save(conversation);
        console.log(reply.toString());
        return;
      }

      if (!value || !question) throw new SemantixError('Both <value> and <question> are required');
      const answer = await new SemanticValue(value, { runtime }).query(question);
      console.log(answer.toString());
    });
  });
