/**
 * Script blocks run on the provisioned machines.
 * Inputs arrive only as positional arguments.
 */

/** $1 = package name */
export const INSTALL_WEB_SERVER_SCRIPT = `
set -e
export DEBIAN_FRONTEND=noninteractive
sudo apt-get update -q
sudo apt-get install -y -q "$1"
sudo systemctl enable --now "$1"
`.trim();

/** $1 = block device, $2 = mount point */
export const INITIALIZE_DATA_DISK_SCRIPT = `
set -e
if mountpoint -q "$2"; then
  exit 0
fi
if ! sudo blkid "$1" >/dev/null 2>&1; then
  sudo mkfs.ext4 -q "$1"
fi
sudo mkdir -p "$2"
sudo mount "$1" "$2"
grep -q "^$1 " /etc/fstab || echo "$1 $2 ext4 defaults,nofail 0 2" | sudo tee -a /etc/fstab >/dev/null
`.trim();

/** $1 = installer package, $2 = private listen address, $3 = data directory */
export const INSTALL_DATABASE_SCRIPT = `
set -e
export DEBIAN_FRONTEND=noninteractive
sudo apt-get install -y -q "$(realpath -- "$1")"
sudo mkdir -p "$3"
printf 'listen_address=%s\\ndata_directory=%s\\n' "$2" "$3" | sudo tee /etc/twotier-database.conf >/dev/null
`.trim();
