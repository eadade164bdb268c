// src/services/fileUploadRepository.ts
import { FileUploadModel, IFileUpload } from '../models/fileUpload.model';

export type FileUploadPatch = Partial<Pick<IFileUpload, 'status' | 'errorMessage' | 'processingMetadata'>>;

export interface IFileUploadRepository {
  create(file: IFileUpload): Promise<IFileUpload>;
  findById(fileId: string): Promise<IFileUpload | null>;
  /** Sheets split from a workbook, in workbook order. */
  findByParent(parentId: string): Promise<IFileUpload[]>;
  update(fileId: string, patch: FileUploadPatch): Promise<IFileUpload | null>;
}

function toFileUpload(doc: IFileUpload): IFileUpload {
  const { fileId, originalFilename, storedFilename, fileType, filePath, parentId, sheetName, sheetIndex,
    status, fileSize, errorMessage, processingMetadata, createdAt, updatedAt } = doc;
  return {
    fileId, originalFilename, storedFilename, fileType, filePath, parentId, sheetName, sheetIndex,
    status, fileSize, errorMessage, processingMetadata, createdAt, updatedAt,
  };
}

export class MongoFileUploadRepository implements IFileUploadRepository {

  public async create(file: IFileUpload): Promise<IFileUpload> {
    const created = await FileUploadModel.create(file);
    return toFileUpload(created.toObject());
  }

  public async findById(fileId: string): Promise<IFileUpload | null> {
    const doc = await FileUploadModel.findOne({ fileId }).lean<IFileUpload>();
    return doc ? toFileUpload(doc) : null;
  }

  public async findByParent(parentId: string): Promise<IFileUpload[]> {
    const docs = await FileUploadModel.find({ parentId }).sort({ sheetIndex: 1 }).lean<IFileUpload[]>();
    return docs.map(toFileUpload);
  }

  public async update(fileId: string, patch: FileUploadPatch): Promise<IFileUpload | null> {
    const doc = await FileUploadModel.findOneAndUpdate({ fileId }, { $set: patch }, { new: true }).lean<IFileUpload>();
    return doc ? toFileUpload(doc) : null;
  }
}
