// packages/recognition/src/blobs/result.ts

import { Effect } from "effect";
import { toBlobView } from "../domain/blob-record";
import { RecordNotFoundError } from "../errors";
import { RecordStore } from "../services/record-store";

export const getBlob = (blobId: string) =>
  Effect.flatMap(RecordStore, (records) => records.get(blobId)).pipe(
    Effect.flatMap((record) =>
      record === undefined
        ? Effect.fail(new RecordNotFoundError({ blobId }))
        : Effect.succeed(toBlobView(record)),
    ),
  );
