import { Telegraf, Context } from "telegraf";
import { message } from "telegraf/filters";
import * as path from "path";
import type { MixerConfig } from "../config";
import { toMixerError } from "../errors";
import { DEFAULT_VIDEO_EXTENSIONS } from "../file-discovery";
import type {
  FileDownloader,
  StreamExtractor,
  StreamMixer,
  VideoUpload,
} from "../types";
import { Logger } from "../utils/logger";
import { formatStreamOverview, truncateMessage } from "../utils/messages";
import { MAX_VOLUME_PERCENT, parseVolumeAssignment } from "../utils/volume";
import { AudioMixService } from "./AudioMixService";
import { FileDownloadService } from "./FileDownloadService";
import { MediaProbeService } from "./MediaProbeService";
import type { MixSession } from "./MixSession";
import { SessionManager } from "./SessionManager";

export interface MixerBotDependencies {
  sessionManager?: SessionManager;
  extractor?: StreamExtractor;
  mixer?: StreamMixer;
  downloader?: FileDownloader;
}

export class MixerBotService {
  private bot: Telegraf;
  private sessionManager: SessionManager;
  private probeService: StreamExtractor;
  private mixService: StreamMixer;
  private fileDownload: FileDownloader;
  private logger = new Logger("MixerBotService");
  private processingUsers = new Set<number>();

  constructor(
    token: string,
    private readonly config: MixerConfig,
    dependencies: MixerBotDependencies = {}
  ) {
    this.bot = new Telegraf(token, {
      telegram: { apiRoot: config.telegramApiRoot },
    });
    this.sessionManager = dependencies.sessionManager ?? new SessionManager();
    this.probeService = dependencies.extractor ?? new MediaProbeService();
    this.mixService = dependencies.mixer ?? new AudioMixService();
    this.fileDownload =
      dependencies.downloader ??
      new FileDownloadService({
        localApiRoot: config.telegramApiRoot,
        localFilesDir: config.telegramFilesDir,
      });
    this.setupHandlers();
    this.setupErrorHandling();
  }

  private setupHandlers(): void {
    this.bot.start((ctx) =>
      ctx.reply(
        `🎚 Welcome!
Send a video (MP4 or MKV) with several audio streams.
Set volumes with /volume, then /mix to get one video with a single mixed track.`
      )
    );
    this.bot.help((ctx) =>
      ctx.reply(
        `📖 Commands:
/start - Welcome
/help - This message
/streams - Show audio streams and volumes
/volume <stream> <percent> - Set a stream's volume (0-${MAX_VOLUME_PERCENT}, steps of 5)
/mix - Mix the streams into one track
/reset - Forget the current video`
      )
    );

    this.bot.command("streams", (ctx) => this.showStreams(ctx));
    this.bot.command("volume", (ctx) =>
      this.setVolume(ctx, ctx.payload)
    );
    this.bot.command("mix", (ctx) => this.processMix(ctx));
    this.bot.command("reset", (ctx) => this.resetSession(ctx));

    this.bot.on(message("video"), (ctx) => {
      const video = ctx.message.video;
      return this.receiveVideo(ctx, {
        fileId: video.file_id,
        fileName: video.file_name || `video_${Date.now()}.mp4`,
      });
    });
    this.bot.on(message("document"), (ctx) => {
      const document = ctx.message.document;
      const fileName = document.file_name || "";
      const extension = path.extname(fileName).toLowerCase();
      if (!DEFAULT_VIDEO_EXTENSIONS.includes(extension)) {
        return ctx.reply("🎞 Please send an MP4 or MKV video.");
      }
      return this.receiveVideo(ctx, { fileId: document.file_id, fileName });
    });
  }

  async receiveVideo(ctx: Context, upload: VideoUpload) {
    const userId = ctx.from?.id;
    if (userId === undefined) return;
    if (this.processingUsers.has(userId)) {
      return ctx.reply("⏳ Mix in progress, wait for it to finish.");
    }

    const session = await this.sessionManager.getOrCreateSession(userId);
    await ctx.reply("📥 Reading video...");

    try {
      const link = await ctx.telegram.getFileLink(upload.fileId);
      const localPath = await this.fileDownload.downloadFile(
        link.href,
        session.filePath(upload.fileName)
      );
      const streams = await this.probeService.extractAudioStreams(localPath);
      session.loadSource(localPath, upload.fileName, streams);

      if (streams.length === 0) {
        return ctx.reply("❌ No audio streams found in this video file.");
      }
      await ctx.reply(this.describeSession(session));
      if (streams.length === 1) {
        await ctx.reply(
          "⚠️ This video has only one audio stream. You can still adjust its volume."
        );
      }
    } catch (err) {
      const failure = toMixerError(err);
      this.logger.error("Upload failed", failure);
      await ctx.reply(
        truncateMessage(`❌ Error reading video file: ${failure.message}`)
      );
    }
  }

  showStreams(ctx: Context) {
    const session = this.currentSession(ctx);
    if (!session?.sourcePath) {
      return ctx.reply("📭 No video yet. Send one first.");
    }
    return ctx.reply(this.describeSession(session));
  }

  setVolume(ctx: Context, payload: string) {
    const session = this.currentSession(ctx);
    if (!session?.audioStreams.length) {
      return ctx.reply("📭 No audio streams to adjust. Send a video first.");
    }
    try {
      const { streamIndex, percent } = parseVolumeAssignment(payload);
      session.setVolume(streamIndex, percent);
      return ctx.reply(`🔊 Stream ${streamIndex} set to ${percent}%.`);
    } catch (err) {
      return ctx.reply(`❌ ${toMixerError(err).message}`);
    }
  }

  async processMix(ctx: Context) {
    const userId = ctx.from?.id;
    if (userId === undefined) return;
    if (this.processingUsers.has(userId)) {
      return ctx.reply("⏳ Mix in progress...");
    }
    const session = this.sessionManager.getSession(userId);
    const sourcePath = session?.sourcePath;
    if (!session || !sourcePath) {
      return ctx.reply("📭 No video yet. Send one first.");
    }
    if (!session.audioStreams.length) {
      return ctx.reply("❌ No audio streams found in this video file.");
    }

    this.processingUsers.add(userId);
    await ctx.reply("🔄 Processing video... This may take a moment.");
    try {
      const outputPath = session.outputPath();
      await this.mixService.mixAudioStreams(
        sourcePath,
        outputPath,
        session.volumeMap()
      );
      session.markMixed(outputPath);
      await ctx.replyWithVideo({
        source: outputPath,
        filename: session.downloadName(),
      });
      await ctx.reply("✅ Audio mixed successfully!");
    } catch (err) {
      const failure = toMixerError(err);
      this.logger.error("Mix failed", failure);
      await ctx.reply(truncateMessage(`❌ Error mixing audio: ${failure.message}`));
    } finally {
      this.processingUsers.delete(userId);
    }
  }

  async resetSession(ctx: Context) {
    const userId = ctx.from?.id;
    if (userId === undefined) return;
    if (this.processingUsers.has(userId)) {
      return ctx.reply("⏳ Mix in progress, wait for it to finish.");
    }
    const removed = await this.sessionManager.deleteSession(userId);
    return ctx.reply(removed ? "🗑 Session cleared." : "❌ Nothing to clear.");
  }

  private currentSession(ctx: Context): MixSession | undefined {
    const userId = ctx.from?.id;
    return userId === undefined
      ? undefined
      : this.sessionManager.getSession(userId);
  }

  private describeSession(session: MixSession): string {
    return truncateMessage(
      `${formatStreamOverview(session.audioStreams, (index) =>
        session.getVolume(index)
      )}\n\nUse /volume <stream> <percent>, then /mix.`
    );
  }

  private setupErrorHandling() {
    this.bot.catch((err) => this.logger.error("Bot error", err));
  }

  async launch() {
    this.sessionManager.startExpiry(this.config.sessionMaxAgeHours);
    this.logger.log("Bot starting");
    await this.bot.launch();
  }

  async stop(reason?: string) {
    this.bot.stop(reason);
    await this.sessionManager.destroy();
  }
}
