import axios from "axios";
import * as fs from "fs";
import * as fsp from "fs/promises";
import * as path from "path";
import { fileURLToPath } from "url";
import type { FileDownloader } from "../types";
import { Logger } from "../utils/logger";

export interface FileDownloadOptions {
  // Root URL of a self-hosted Bot API server, if any
  localApiRoot?: string;
  // Directory the self-hosted server stores files in
  localFilesDir: string;
}

export class FileDownloadService implements FileDownloader {
  private logger = new Logger("FileDownloadService");

  constructor(private readonly options: FileDownloadOptions) {}

  /**
   * Fetches a Telegram file link into `destination` and returns that path.
   * A self-hosted Bot API server keeps files on local disk, so those are
   * copied instead of downloaded.
   */
  async downloadFile(fileLink: string, destination: string): Promise<string> {
    if (this.isLocalPath(fileLink)) {
      await this.copyLocalFile(this.resolveLocalPath(fileLink), destination);
    } else {
      await this.downloadRemoteFile(fileLink, destination);
    }
    return destination;
  }

  isLocalPath(url: string): boolean {
    const { localApiRoot } = this.options;
    return (
      url.startsWith("file://") ||
      !url.startsWith("http") ||
      (localApiRoot !== undefined && url.startsWith(localApiRoot))
    );
  }

  resolveLocalPath(url: string): string {
    const { localFilesDir } = this.options;

    if (url.startsWith("file://")) {
      return fileURLToPath(url);
    }

    if (url.startsWith("http")) {
      const filePathPart = url.split("/file/")[1];
      if (!filePathPart) {
        throw new Error(`Invalid local API URL format: ${url}`);
      }
      // "bot<token>/<file path>"
      const pathAfterToken = decodeURIComponent(
        filePathPart.substring(filePathPart.indexOf("/") + 1)
      );
      return path.isAbsolute(pathAfterToken)
        ? path.normalize(pathAfterToken)
        : path.join(localFilesDir, pathAfterToken);
    }

    return path.normalize(
      path.isAbsolute(url) ? url : path.join(localFilesDir, url)
    );
  }

  private async copyLocalFile(localPath: string, destination: string) {
    this.logger.log(`Copying file: ${localPath} to ${destination}`);
    try {
      await fsp.access(localPath, fs.constants.R_OK);
    } catch (accessError) {
      this.logger.error(`Failed to access local file: ${localPath}`, accessError);
      throw new Error(`Local file not found or not accessible: ${localPath}`);
    }
    await fsp.copyFile(localPath, destination);
  }

  private async downloadRemoteFile(url: string, destination: string) {
    this.logger.log(`Downloading file to ${destination}`);

    const response = await axios.get<NodeJS.ReadableStream>(url, {
      responseType: "stream",
      timeout: 300000, // 5 minutes timeout for downloads
    });

    try {
      await new Promise<void>((resolve, reject) => {
        response.data
          .on("error", reject)
          .pipe(fs.createWriteStream(destination))
          .on("finish", () => resolve())
          .on("error", reject);
      });
    } catch (error) {
      await fsp.rm(destination, { force: true });
      throw error;
    }

    this.logger.log(`Download completed: ${destination}`);
  }
}
