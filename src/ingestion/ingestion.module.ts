import { Module } from '@nestjs/common';
import { TextReader } from './readers/text.reader';
import { PdfReader } from './readers/pdf.reader';
import { DocxReader } from './readers/docx.reader';
import { ReaderRegistry } from './readers/reader.registry';
import { RecursiveChunkerService } from './chunking/recursive-chunker.service';
import { DocumentLoaderService } from './document-loader.service';

@Module({
  providers: [
    TextReader,
    PdfReader,
    DocxReader,
    ReaderRegistry,
    RecursiveChunkerService,
    DocumentLoaderService,
  ],
  exports: [DocumentLoaderService, RecursiveChunkerService],
})
export class IngestionModule {}
