import { applyMenuItemEdit, type MenuItemEdit } from "./editor";
import { EditCoercionError, UploadValidationError } from "./errors";
import { createId } from "./log";
import { validateUpload } from "./uploads";
import type {
  MenuItem,
  MenuSession,
  PipelineStage,
  RenderedImage,
  SupportedMimeType,
  UploadCandidate,
  UploadedFile,
} from "../types";

export interface AcceptUploadsResult {
  session: MenuSession;
  accepted: UploadedFile[];
  duplicates: string[];
  errors: UploadValidationError[];
}

export interface EditResult {
  session: MenuSession;
  error?: EditCoercionError;
}

export function createSession(): MenuSession {
  return {
    id: createId(),
    uploads: [],
    images: [],
    selectedImageIds: [],
    items: [],
    failures: [],
  };
}

/** Ends the current session; everything it held is dropped. */
export function resetSession(): MenuSession {
  return createSession();
}

export function acceptUploads(
  session: MenuSession,
  candidates: UploadCandidate[],
): AcceptUploadsResult {
  const accepted: UploadedFile[] = [];
  const duplicates: string[] = [];
  const errors: UploadValidationError[] = [];
  const seen = new Set(session.uploads.map((upload) => `${upload.name}:${upload.size}`));

  for (const candidate of candidates) {
    let mimeType: SupportedMimeType;
    try {
      mimeType = validateUpload(candidate);
    } catch (error) {
      if (error instanceof UploadValidationError) {
        errors.push(error);
        continue;
      }
      throw error;
    }

    const key = `${candidate.name}:${candidate.size}`;
    if (seen.has(key)) {
      duplicates.push(candidate.name);
      continue;
    }
    seen.add(key);
    accepted.push({
      id: createId(),
      name: candidate.name,
      mimeType,
      size: candidate.size,
      bytes: candidate.bytes,
    });
  }

  if (accepted.length === 0) {
    return { session, accepted, duplicates, errors };
  }

  return {
    session: { ...session, uploads: [...session.uploads, ...accepted] },
    accepted,
    duplicates,
    errors,
  };
}

export function removeUpload(session: MenuSession, uploadId: string): MenuSession {
  const upload = session.uploads.find((entry) => entry.id === uploadId);
  if (!upload) return session;

  const removedImageIds = new Set(
    session.images
      .filter((image) => image.uploadId === uploadId)
      .map((image) => image.id),
  );

  return {
    ...session,
    uploads: session.uploads.filter((entry) => entry.id !== uploadId),
    images: session.images.filter((image) => !removedImageIds.has(image.id)),
    selectedImageIds: session.selectedImageIds.filter(
      (id) => !removedImageIds.has(id),
    ),
    failures: session.failures.filter(
      (failure) => !(failure.stage === "render" && failure.subject === upload.name),
    ),
  };
}

export function attachRenderedImages(
  session: MenuSession,
  images: RenderedImage[],
): MenuSession {
  if (images.length === 0) return session;
  return { ...session, images: [...session.images, ...images] };
}

export function recordFailure(
  session: MenuSession,
  stage: PipelineStage,
  subject: string,
  message: string,
): MenuSession {
  return {
    ...session,
    failures: [...session.failures, { id: createId(), stage, subject, message }],
  };
}

export function clearFailures(
  session: MenuSession,
  stage: PipelineStage,
): MenuSession {
  return {
    ...session,
    failures: session.failures.filter((failure) => failure.stage !== stage),
  };
}

export function setImageSelection(
  session: MenuSession,
  imageIds: string[],
): MenuSession {
  const wanted = new Set(imageIds);
  return {
    ...session,
    selectedImageIds: session.images
      .filter((image) => wanted.has(image.id))
      .map((image) => image.id),
  };
}

export function toggleImageSelection(
  session: MenuSession,
  imageId: string,
): MenuSession {
  const selected = session.selectedImageIds.includes(imageId);
  return setImageSelection(
    session,
    selected
      ? session.selectedImageIds.filter((id) => id !== imageId)
      : [...session.selectedImageIds, imageId],
  );
}

export function selectAllImages(session: MenuSession): MenuSession {
  return setImageSelection(
    session,
    session.images.map((image) => image.id),
  );
}

export function selectedImages(session: MenuSession): RenderedImage[] {
  const wanted = new Set(session.selectedImageIds);
  return session.images.filter((image) => wanted.has(image.id));
}

export function replaceMenuItems(
  session: MenuSession,
  items: MenuItem[],
): MenuSession {
  return { ...session, items };
}

export function editMenuItem(
  session: MenuSession,
  itemId: string,
  edit: MenuItemEdit,
): EditResult {
  const index = session.items.findIndex((item) => item.id === itemId);
  if (index < 0) {
    return {
      session,
      error: new EditCoercionError(edit.kind, "", "This menu item no longer exists."),
    };
  }

  try {
    const updated = applyMenuItemEdit(session.items[index], edit);
    const items = [...session.items];
    items[index] = updated;
    return { session: { ...session, items } };
  } catch (error) {
    if (error instanceof EditCoercionError) {
      return { session, error };
    }
    throw error;
  }
}

export function removeMenuItem(session: MenuSession, itemId: string): MenuSession {
  return {
    ...session,
    items: session.items.filter((item) => item.id !== itemId),
  };
}
