import { Injectable } from '@nestjs/common';
import { Enforce } from '../../lib';

export interface DocumentView {
  userId: string;
  docId: string;
  content: string;
}

@Injectable()
export class DocumentsService {
  /** Checked a second time against the path owner, independently of the request filter. */
  @Enforce({
    subject: (ctx) => String(ctx.args[0]),
    action: (ctx) => String(ctx.args[2]),
    resource: (ctx) => `document:${String(ctx.args[1])}`,
  })
  async getDocument(userId: string, docId: string, action: string): Promise<DocumentView> {
    return {
      userId,
      docId,
      content: `Document ${docId} content for user ${userId} (${action})`,
    };
  }
}
