import JSZip from "jszip";

export type ArchiveMember = {
  name: string;
  read: () => Promise<Uint8Array>;
};

export type ArchiveOpenResult =
  | { ok: true; members: ArchiveMember[] }
  | { ok: false; message: string };

// Directory entries are skipped; member order follows the archive's central directory.
export async function openArchive(bytes: Uint8Array): Promise<ArchiveOpenResult> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }

  const members: ArchiveMember[] = [];
  zip.forEach((relativePath, entry) => {
    if (entry.dir) return;
    members.push({ name: relativePath, read: () => entry.async("uint8array") });
  });

  return { ok: true, members };
}
