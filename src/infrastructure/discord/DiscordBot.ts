import {
  Client,
  Events,
  GatewayIntentBits,
  Interaction,
  MessageFlags,
  SlashCommandBuilder
} from 'discord.js';
import { CommandDefinition, CommandReply, CommandService, COMMAND_DEFINITIONS } from '../../application/services/CommandService';
import { IEventBus } from '../../domain/events/IEventBus';
import { createEvent } from '../../domain/events/DomainEvents';
import { ILogger } from '../../domain/common/ILogger';
import { toError } from '../../domain/common/Errors';

const MESSAGE_LIMIT = 2000;

function buildSlashCommand(definition: CommandDefinition) {
  const builder = new SlashCommandBuilder()
    .setName(definition.name)
    .setDescription(definition.description);

  for (const option of definition.options) {
    builder.addIntegerOption(integer => integer
      .setName(option.name)
      .setDescription(option.description)
      .setRequired(option.required)
      .setMinValue(option.minValue)
      .setMaxValue(option.maxValue));
  }

  return builder.toJSON();
}

function truncate(content: string): string {
  return content.length <= MESSAGE_LIMIT ? content : `${content.slice(0, MESSAGE_LIMIT - 1)}…`;
}

/**
 * discord.js client for one guild: login, slash command registration and
 * routing of command interactions to the CommandService.
 */
export class DiscordBot {
  readonly client: Client;
  private commands: CommandService | null = null;

  constructor(
    private token: string,
    private guildId: string,
    private eventBus: IEventBus,
    private logger: ILogger
  ) {
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates]
    });

    this.client.on(Events.InteractionCreate, (interaction) => {
      this.handleInteraction(interaction).catch((err: unknown) => {
        this.logger.error('Failed to answer interaction:', toError(err));
      });
    });
  }

  /**
   * Log in, wait for the gateway to be ready and register the guild commands.
   */
  async start(commands: CommandService): Promise<void> {
    this.commands = commands;

    const ready = new Promise<void>(resolve => {
      this.client.once(Events.ClientReady, () => resolve());
    });
    await this.client.login(this.token);
    await ready;
    this.logger.info(`Logged in as ${this.client.user?.tag ?? 'unknown user'}`);

    const guild = await this.client.guilds.fetch(this.guildId);
    await guild.commands.set(COMMAND_DEFINITIONS.map(buildSlashCommand));
    this.logger.info(`Registered ${COMMAND_DEFINITIONS.length} slash commands`, { guildId: this.guildId });

    this.eventBus.publish(createEvent('system:ready', { guildId: this.guildId }, 'system'));
  }

  async stop(): Promise<void> {
    await this.client.destroy();
    this.logger.info('Discord client destroyed');
  }

  private async handleInteraction(interaction: Interaction): Promise<void> {
    if (!interaction.isChatInputCommand() || !this.commands) return;

    const integerOptions: Record<string, number | undefined> = {};
    for (const option of interaction.options.data) {
      if (typeof option.value === 'number') {
        integerOptions[option.name] = option.value;
      }
    }

    let reply: CommandReply;
    try {
      reply = await this.commands.execute({
        name: interaction.commandName,
        userMention: interaction.user.toString(),
        integerOptions
      });
    } catch (err) {
      this.logger.error(`Command /${interaction.commandName} failed:`, toError(err));
      reply = { content: '❌ Something went wrong, please try again later.', ephemeral: true };
    }

    await interaction.reply({
      content: truncate(reply.content),
      flags: reply.ephemeral ? MessageFlags.Ephemeral : undefined
    });
  }
}
