import postmark from 'postmark';

// ---------------------------------------------------------------------------
// Email client (Postmark)
// ---------------------------------------------------------------------------

export interface EmailMessage {
  From: string;
  To: string;
  Subject: string;
  HtmlBody: string;
  TextBody: string;
  MessageStream: string;
}

export interface EmailSendResult {
  MessageID: string;
}

/** The slice of postmark's ServerClient the notifier uses. */
export interface EmailClient {
  sendEmail(message: EmailMessage): Promise<EmailSendResult>;
}

export interface PostmarkEmailClientOptions {
  apiKey: string;
  /** Request deadline; postmark aborts the call after this many seconds. */
  timeoutSeconds: number;
}

export function createPostmarkEmailClient(opts: PostmarkEmailClientOptions): EmailClient {
  const client = new postmark.ServerClient(opts.apiKey, {
    timeout: opts.timeoutSeconds,
  });

  return {
    async sendEmail(message) {
      const result = await client.sendEmail(message);
      return { MessageID: result.MessageID };
    },
  };
}
