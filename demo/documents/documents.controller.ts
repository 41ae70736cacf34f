import { Controller, Get, Param, Query } from '@nestjs/common';
import { validInputOrThrow } from '../validation';
import { DocumentQuerySchema } from './document-query';
import { DocumentsService, DocumentView } from './documents.service';

@Controller('api/users/:userId/documents')
export class DocumentsController {
  constructor(private readonly documents: DocumentsService) {}

  @Get(':docId')
  getDocument(
    @Param('userId') userId: string,
    @Param('docId') docId: string,
    @Query() query: unknown,
  ): Promise<DocumentView> {
    const { action } = validInputOrThrow(DocumentQuerySchema, query, 'query');
    return this.documents.getDocument(userId, docId, action);
  }
}
