export {
  storeClip,
  getClip,
  listClips,
  searchClips,
  labelClip,
  deleteClip,
  clearClips,
  type CommandContext,
  type ConfirmFn,
  type StoreClipInput,
  type StoreClipOutcome,
  type GetClipOutcome,
  type DeleteClipOutcome,
  type ClearClipsOutcome,
} from './clip-commands';

export {
  truncatePreview,
  formatSize,
  formatTimestamp,
  toClipRow,
  renderTable,
  renderClips,
  type ClipTableRow,
} from './format';
