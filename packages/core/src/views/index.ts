export { createDataFeeder, type DataSource, type FetchTable, type TableData } from "./dataSource.js";
export {
  TableView,
  type NamespacedName,
  type PageAction,
  type TableViewOptions,
} from "./tableView.js";
export { TextView, type TextViewOptions } from "./textView.js";
export {
  createConfirmDialog,
  type ConfirmDialog,
  type ConfirmDialogOptions,
} from "./confirmDialog.js";
export { menuPanel, statusBox, type MenuPanelInfo, type MenuShortcut } from "./overlays.js";
