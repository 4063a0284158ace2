import { describe, expect, it } from "vitest";
import {
  acceptUploads,
  attachRenderedImages,
  createSession,
  editMenuItem,
  recordFailure,
  removeMenuItem,
  removeUpload,
  replaceMenuItems,
  selectAllImages,
  selectedImages,
  setImageSelection,
  toggleImageSelection,
} from "./session";
import type { MenuItem, MenuSession, RenderedImage, UploadCandidate } from "../types";

function candidate(name: string, type: string, size = 4): UploadCandidate {
  return { name, type, size, bytes: new Uint8Array(size) };
}

function image(id: string, uploadId: string, pageNumber = 1): RenderedImage {
  return {
    id,
    uploadId,
    sourceName: `${uploadId}.pdf`,
    pageNumber,
    totalPages: 2,
    mimeType: "image/jpeg",
    dataUrl: "data:image/jpeg;base64,",
  };
}

const menuItem: MenuItem = {
  id: "item-1",
  source: "lunch.jpg",
  name: "Veg Biryani",
  prices: [180],
  price_labels: [""],
  description: "",
  dietary_label: "veg",
  flags: [],
};

describe("acceptUploads", () => {
  it("leaves the session unchanged when every file is rejected", () => {
    const session = createSession();

    const result = acceptUploads(session, [candidate("notes.txt", "text/plain")]);

    expect(result.session).toBe(session);
    expect(result.accepted).toEqual([]);
    expect(result.errors.map((error) => error.fileName)).toEqual(["notes.txt"]);
  });

  it("keeps valid files from a mixed batch", () => {
    const result = acceptUploads(createSession(), [
      candidate("dinner.pdf", "application/pdf"),
      candidate("notes.txt", "text/plain"),
      candidate("board.jpg", ""),
    ]);

    expect(result.session.uploads.map((upload) => [upload.name, upload.mimeType])).toEqual([
      ["dinner.pdf", "application/pdf"],
      ["board.jpg", "image/jpeg"],
    ]);
    expect(result.errors).toHaveLength(1);
  });

  it("skips a file that is already uploaded", () => {
    const first = acceptUploads(createSession(), [candidate("dinner.pdf", "application/pdf")]);

    const second = acceptUploads(first.session, [
      candidate("dinner.pdf", "application/pdf"),
    ]);

    expect(second.duplicates).toEqual(["dinner.pdf"]);
    expect(second.session).toBe(first.session);
  });
});

describe("image selection", () => {
  const session: MenuSession = {
    ...createSession(),
    images: [image("a1", "a", 1), image("a2", "a", 2), image("b1", "b")],
  };

  it("keeps gallery order and ignores unknown ids", () => {
    const selected = setImageSelection(session, ["b1", "missing", "a1"]);

    expect(selected.selectedImageIds).toEqual(["a1", "b1"]);
    expect(selectedImages(selected).map((entry) => entry.id)).toEqual(["a1", "b1"]);
  });

  it("toggles single images", () => {
    const on = toggleImageSelection(session, "a2");
    const off = toggleImageSelection(on, "a2");

    expect(on.selectedImageIds).toEqual(["a2"]);
    expect(off.selectedImageIds).toEqual([]);
  });

  it("selects every image", () => {
    expect(selectAllImages(session).selectedImageIds).toEqual(["a1", "a2", "b1"]);
  });
});

describe("removeUpload", () => {
  it("drops the upload with its images, selection and failures", () => {
    const accepted = acceptUploads(createSession(), [
      candidate("a.pdf", "application/pdf"),
      candidate("b.pdf", "application/pdf"),
    ]);
    const [first, second] = accepted.session.uploads;
    let session = attachRenderedImages(accepted.session, [
      image("a1", first.id),
      image("b1", second.id),
    ]);
    session = selectAllImages(session);
    session = recordFailure(session, "render", "a.pdf", "a.pdf: PDF has no pages.");

    const next = removeUpload(session, first.id);

    expect(next.uploads.map((upload) => upload.name)).toEqual(["b.pdf"]);
    expect(next.images.map((entry) => entry.id)).toEqual(["b1"]);
    expect(next.selectedImageIds).toEqual(["b1"]);
    expect(next.failures).toEqual([]);
  });
});

describe("editMenuItem", () => {
  const session = replaceMenuItems(createSession(), [menuItem]);

  it("replaces the edited item", () => {
    const result = editMenuItem(session, "item-1", { kind: "price", index: 0, value: "200" });

    expect(result.error).toBeUndefined();
    expect(result.session.items[0].prices).toEqual([200]);
    expect(session.items[0].prices).toEqual([180]);
  });

  it("returns the unchanged session and the error for a bad value", () => {
    const result = editMenuItem(session, "item-1", {
      kind: "price",
      index: 0,
      value: "abc",
    });

    expect(result.session).toBe(session);
    expect(result.error?.message).toBe('"abc" is not a valid price.');
    expect(result.session.items[0].prices).toEqual([180]);
  });

  it("reports an edit on a removed item", () => {
    const result = editMenuItem(removeMenuItem(session, "item-1"), "item-1", {
      kind: "name",
      value: "Pulao",
    });

    expect(result.error?.message).toBe("This menu item no longer exists.");
  });
});
