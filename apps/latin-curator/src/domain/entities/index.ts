export {
    createCorpusDocument,
    routeLabel,
    type CorpusDocument,
    type CorpusDocumentInit,
    type CorpusMetadata,
} from "./CorpusDocument.js";
